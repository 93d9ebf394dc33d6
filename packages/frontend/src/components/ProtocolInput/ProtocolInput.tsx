import { useState, type FormEvent } from 'react';
import { loadReport, useReport } from '../../store/report.store.js';
import styles from './ProtocolInput.module.css';

const DAY_RANGES = [
  { days: 7, label: '7 days' },
  { days: 30, label: '30 days' },
  { days: 90, label: '90 days' },
  { days: 365, label: '1 year' },
];

export function ProtocolInput() {
  const { state, dispatch } = useReport();
  const [query, setQuery] = useState('');
  const [days, setDays] = useState(state.days);

  function handleSubmit(e: FormEvent) {
    e.preventDefault();
    const protocol = query.trim();
    if (!protocol) {
      dispatch({ type: 'FETCH_ERROR', payload: { message: 'Enter a protocol name, e.g. "aave" or "uniswap".', suggestions: [] } });
      return;
    }
    void loadReport(dispatch, protocol, days);
  }

  return (
    <form className={styles.form} onSubmit={handleSubmit}>
      <div className={styles.row}>
        <input
          className={styles.queryInput}
          type="text"
          placeholder="Protocol name (aave, uniswap, lido...)"
          value={query}
          onChange={e => setQuery(e.target.value)}
          spellCheck={false}
        />
        <select
          className={styles.daysSelect}
          value={days}
          onChange={e => setDays(Number(e.target.value))}
        >
          {DAY_RANGES.map(r => (
            <option key={r.days} value={r.days}>{r.label}</option>
          ))}
        </select>
        <button className={styles.submitBtn} type="submit" disabled={state.loading}>
          Research
        </button>
      </div>
    </form>
  );
}
