import { useCallback, useState } from 'react';

import './App.css';
import { SessionSetup } from './components/SessionSetup';
import { SessionTimer } from './components/SessionTimer';
import { ToastNotification } from './components/ToastNotification';
import type { SessionConfig, SessionPlan } from './data/exercise';
import { useExerciseLibrary } from './hooks/useExerciseLibrary';
import { useToast } from './hooks/useToast';
import { ExerciseLibrary } from './pages/ExerciseLibrary';
import { getErrorMessage, isSessionError } from './utils/errors';
import { generateSession } from './utils/sessionGenerator';
import { formatMinutesLabel } from './utils/time';

type View = 'session' | 'library';

type ActiveSession = {
  plan: SessionPlan;
  config: SessionConfig;
};

export default function App() {
  const library = useExerciseLibrary();
  const { toasts, removeToast, success, error, info } = useToast();
  const [view, setView] = useState<View>('session');
  const [session, setSession] = useState<ActiveSession | null>(null);
  const [voiceEnabled, setVoiceEnabled] = useState(false);

  const handleGenerate = useCallback(
    (config: SessionConfig) => {
      try {
        const plan = generateSession(config, library.exercises);
        setSession({ plan, config });
        info(
          `${plan.entries.length} exercises, ${formatMinutesLabel(plan.totalDurationSeconds)}`
        );
      } catch (err) {
        if (!isSessionError(err)) {
          console.error('[Session] Unexpected generation failure:', err);
        }
        error(getErrorMessage(err));
      }
    },
    [library.exercises, info, error]
  );

  const handleComplete = useCallback(() => {
    success('Session complete');
  }, [success]);

  const handleDifficultyChange = useCallback(
    (name: string, difficulty: number) => {
      info(`${name} difficulty set to ${difficulty.toFixed(1)} for future sessions`);
    },
    [info]
  );

  if (view === 'library') {
    return (
      <div className="app">
        <ExerciseLibrary
          library={library}
          onBack={() => setView('session')}
          onSuccess={success}
          onError={error}
        />
        <ToastNotification toasts={toasts} onRemove={removeToast} />
      </div>
    );
  }

  return (
    <div className="app">
      <header className="app-header">
        <h1>Circuit Timer</h1>
        <button className="btn" type="button" onClick={() => setView('library')}>
          Exercise library
        </button>
      </header>

      <SessionSetup
        exercises={library.exercises}
        voiceEnabled={voiceEnabled}
        onVoiceChange={setVoiceEnabled}
        onGenerate={handleGenerate}
      />

      {session && (
        <SessionTimer
          plan={session.plan}
          library={library.gateway}
          equipmentFilter={session.config.equipmentFilter}
          voiceEnabled={voiceEnabled}
          onComplete={handleComplete}
          onDifficultyChange={handleDifficultyChange}
        />
      )}

      <ToastNotification toasts={toasts} onRemove={removeToast} />
    </div>
  );
}
