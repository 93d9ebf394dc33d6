import { useMemo } from 'react';
import { ReportContext, useReportReducer } from './store/report.store.js';
import { ProtocolInput } from './components/ProtocolInput/ProtocolInput.js';
import { Suggestions } from './components/Suggestions/Suggestions.js';
import { ReportView } from './components/ReportView/ReportView.js';
import styles from './App.module.css';

export function App() {
  const [state, dispatch] = useReportReducer();
  const contextValue = useMemo(() => ({ state, dispatch }), [state, dispatch]);

  return (
    <ReportContext.Provider value={contextValue}>
      <div className={styles.app}>
        <header className={styles.header}>
          <div className={styles.logo}>
            <span className={styles.logoIcon}>⬡</span>
            <span className={styles.logoText}>Protocol Scout</span>
          </div>
          <p className={styles.tagline}>
            Type a DeFi protocol name to get its TVL, chains, funding and hack history.
          </p>
        </header>

        <main className={styles.main}>
          <div className={styles.inputSection}>
            <ProtocolInput />
          </div>

          {state.loading && (
            <div className={styles.loading}>
              <div className={styles.spinner} />
              <span>Resolving {state.query} and fetching data...</span>
            </div>
          )}

          {state.error && !state.loading && (
            <div className={styles.error}>
              <strong>Error:</strong> {state.error}
              <Suggestions names={state.suggestions} />
            </div>
          )}

          {state.report && !state.loading && (
            <ReportView report={state.report} />
          )}
        </main>
      </div>
    </ReportContext.Provider>
  );
}
