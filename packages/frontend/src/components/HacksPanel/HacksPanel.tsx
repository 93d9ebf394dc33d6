import type { HacksSection } from '@protocol-scout/shared';
import { formatUsd } from '../../format.js';
import styles from './HacksPanel.module.css';

interface HacksPanelProps {
  hacks: HacksSection;
}

export function HacksPanel({ hacks }: HacksPanelProps) {
  if (hacks.totalHacks === 0) {
    return (
      <div className={styles.panel}>
        <h3 className={styles.title}>Security Incidents</h3>
        <p className={styles.empty}>No recorded hacks.</p>
      </div>
    );
  }

  return (
    <div className={styles.panel}>
      <h3 className={styles.title}>Security Incidents ({hacks.totalHacks})</h3>
      <p className={styles.summary}>
        {formatUsd(hacks.totalAmountLostUsd)} lost · {formatUsd(hacks.totalAmountReturnedUsd)} returned
      </p>
      <div className={styles.tableWrapper}>
        <table className={styles.table}>
          <thead>
            <tr>
              <th>Date</th>
              <th>Lost</th>
              <th>Returned</th>
              <th>Chains</th>
              <th>Technique</th>
              <th>Source</th>
            </tr>
          </thead>
          <tbody>
            {hacks.incidents.map((incident, i) => (
              <tr key={i}>
                <td>{incident.date}</td>
                <td className={styles.lost}>{formatUsd(incident.amountLostUsd)}</td>
                <td>{formatUsd(incident.returnedFundsUsd)}</td>
                <td>{incident.chain.join(', ')}</td>
                <td title={incident.classification}>{incident.technique || incident.classification}</td>
                <td>
                  {incident.sourceUrl && (
                    <a href={incident.sourceUrl} target="_blank" rel="noreferrer">link</a>
                  )}
                </td>
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </div>
  );
}
