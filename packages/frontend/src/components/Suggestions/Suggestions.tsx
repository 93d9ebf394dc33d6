import { loadReport, useReport } from '../../store/report.store.js';
import styles from './Suggestions.module.css';

interface SuggestionsProps {
  names: string[];
}

export function Suggestions({ names }: SuggestionsProps) {
  const { state, dispatch } = useReport();
  if (names.length === 0) return null;

  return (
    <div className={styles.suggestions}>
      <span className={styles.label}>Did you mean:</span>
      {names.map(name => (
        <button
          key={name}
          className={styles.chip}
          type="button"
          onClick={() => void loadReport(dispatch, name, state.days)}
        >
          {name}
        </button>
      ))}
    </div>
  );
}
