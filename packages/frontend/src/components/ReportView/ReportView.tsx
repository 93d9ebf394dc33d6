import type { ProtocolReport } from '@protocol-scout/shared';
import { formatMillions, formatUsd } from '../../format.js';
import { HacksPanel } from '../HacksPanel/HacksPanel.js';
import styles from './ReportView.module.css';

interface ReportViewProps {
  report: ProtocolReport;
}

export function ReportView({ report }: ReportViewProps) {
  const { metadata, tvl, chains, funding, hacks, hallmarks } = report;
  const peakTvl = Math.max(0, ...tvl.tvlHistory.map(p => p.tvlUsd));

  return (
    <div className={styles.view}>
      {/* Header */}
      <div className={styles.header}>
        <div className={styles.titleRow}>
          {metadata.logo && <img className={styles.logo} src={metadata.logo} alt="" />}
          <h2 className={styles.name}>{metadata.protocolName}</h2>
          <span className={styles.category}>{metadata.category}</span>
          {metadata.isParentProtocol && <span className={styles.parentBadge}>Parent</span>}
        </div>
        <div className={styles.meta}>
          {metadata.slug}
          {metadata.url && (
            <> · <a href={metadata.url} target="_blank" rel="noreferrer">{metadata.url}</a></>
          )}
          {' '}· queried {metadata.queriedAt}
        </div>
        {metadata.description && <p className={styles.description}>{metadata.description}</p>}
        {metadata.childProtocols.length > 0 && (
          <div className={styles.children}>
            {metadata.childProtocols.map(child => (
              <span key={child} className={styles.child}>{child}</span>
            ))}
          </div>
        )}
      </div>

      {/* TVL */}
      <section className={styles.section}>
        <h3 className={styles.sectionTitle}>TVL · {formatUsd(tvl.currentTvlUsd)}</h3>
        {tvl.tvlHistory.length > 0 ? (
          <div className={styles.sparkline}>
            {tvl.tvlHistory.map(point => (
              <div
                key={point.date}
                className={styles.bar}
                style={{ height: `${peakTvl > 0 ? (point.tvlUsd / peakTvl) * 100 : 0}%` }}
                title={`${point.date}: ${formatUsd(point.tvlUsd)}`}
              />
            ))}
          </div>
        ) : (
          <p className={styles.empty}>No TVL history.</p>
        )}
      </section>

      {/* Chains */}
      <section className={styles.section}>
        <h3 className={styles.sectionTitle}>Chains ({chains.deployedChains.length})</h3>
        <div className={styles.chains}>
          {chains.deployedChains.map(chain => (
            <div key={chain} className={styles.chain}>
              <span>{chain}</span>
              <span className={styles.amount}>{formatUsd(chains.chainTvl[chain] ?? 0)}</span>
            </div>
          ))}
        </div>
      </section>

      {/* Funding */}
      <section className={styles.section}>
        <h3 className={styles.sectionTitle}>
          Funding · {formatMillions(funding.totalRaisedUsdMillions)}
        </h3>
        {funding.rounds.length === 0 ? (
          <p className={styles.empty}>No recorded raises.</p>
        ) : (
          <div className={styles.rounds}>
            {funding.rounds.map((round, i) => (
              <div key={i} className={styles.round}>
                <span className={styles.roundDate}>{round.date}</span>
                <span className={styles.roundType}>{round.roundType ?? 'Undisclosed'}</span>
                <span className={styles.amount}>{formatMillions(round.amountUsdMillions)}</span>
                <span className={styles.investors}>
                  {[...round.leadInvestors, ...round.otherInvestors].join(', ')}
                </span>
              </div>
            ))}
          </div>
        )}
      </section>

      {/* Hacks */}
      <section className={styles.section}>
        <HacksPanel hacks={hacks} />
      </section>

      {/* Hallmarks */}
      {hallmarks.length > 0 && (
        <section className={styles.section}>
          <h3 className={styles.sectionTitle}>Hallmarks</h3>
          <ul className={styles.hallmarks}>
            {hallmarks.map((h, i) => (
              <li key={i}>
                <span className={styles.roundDate}>{h.date}</span> {h.event}
              </li>
            ))}
          </ul>
        </section>
      )}
    </div>
  );
}
