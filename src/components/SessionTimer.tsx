import { useCallback } from 'react';

import { DIFFICULTY_STEP, type ScheduledExercise, type SessionPlan } from '../data/exercise';
import { useSessionController } from '../hooks/useSessionController';
import { announceExercise, speak } from '../utils/speech';
import type { LibraryGateway } from '../utils/sessionController';
import { formatDuration } from '../utils/time';
import { SessionPlanChart } from './SessionPlanChart';
import { SessionPlanList } from './SessionPlanList';

interface SessionTimerProps {
  plan: SessionPlan;
  library?: LibraryGateway;
  equipmentFilter?: readonly string[];
  voiceEnabled?: boolean;
  onComplete?: (totalElapsedSeconds: number) => void;
  onDifficultyChange?: (name: string, difficulty: number) => void;
}

export function SessionTimer({
  plan,
  library,
  equipmentFilter,
  voiceEnabled = false,
  onComplete,
  onDifficultyChange,
}: SessionTimerProps) {
  const handleExerciseChange = useCallback(
    (entry: ScheduledExercise) => {
      if (voiceEnabled) {
        announceExercise(entry.exercise.name, entry.durationSeconds);
      }
    },
    [voiceEnabled]
  );

  const handleComplete = useCallback(
    (totalElapsedSeconds: number) => {
      if (voiceEnabled) {
        speak('Session complete');
      }
      onComplete?.(totalElapsedSeconds);
    },
    [voiceEnabled, onComplete]
  );

  const session = useSessionController(plan, {
    library,
    equipmentFilter,
    onExerciseChange: handleExerciseChange,
    onComplete: handleComplete,
  });

  const { state, currentEntry, nextEntry } = session;
  if (!state || !currentEntry) {
    return null;
  }

  const { phase } = state;
  const isActive = phase === 'running' || phase === 'paused';

  const handleAdjust = (delta: number) => {
    const difficulty = session.adjustDifficulty(delta);
    if (difficulty !== null) {
      onDifficultyChange?.(currentEntry.exercise.name, difficulty);
    }
  };

  return (
    <section className="session-timer" data-phase={phase}>
      <header className="session-timer-header">
        <span className="session-timer-count">
          {phase === 'completed'
            ? 'Done'
            : `${state.currentIndex + 1}/${state.plan.entries.length}`}
        </span>
        <h2 className="session-timer-exercise">
          {phase === 'completed' ? 'Session complete' : currentEntry.exercise.name}
        </h2>
      </header>

      <div className="session-timer-clock" aria-label="Time remaining">
        {formatDuration(phase === 'completed' ? 0 : state.remainingSeconds)}
      </div>

      <div
        className="session-timer-progress"
        role="progressbar"
        aria-valuemin={0}
        aria-valuemax={100}
        aria-valuenow={session.progress}
      >
        <div className="session-timer-progress-fill" style={{ width: `${session.progress}%` }} />
      </div>

      <p className="session-timer-meta">
        <span>Left {formatDuration(phase === 'completed' ? 0 : session.remainingSessionSec)}</span>
        {nextEntry && phase !== 'completed' && <span>Next: {nextEntry.exercise.name}</span>}
      </p>

      <div className="session-timer-controls">
        {phase === 'running' ? (
          <button className="btn" type="button" onClick={session.pause}>
            Pause
          </button>
        ) : (
          <button
            className="btn btn-primary"
            type="button"
            onClick={session.start}
            disabled={phase === 'completed'}
          >
            {phase === 'paused' ? 'Resume' : 'Start'}
          </button>
        )}
        <button className="btn" type="button" onClick={session.skip} disabled={!isActive}>
          Skip
        </button>
        <button className="btn" type="button" onClick={session.restart}>
          Restart
        </button>
      </div>

      {library && (
        <div className="session-timer-difficulty">
          <button
            className="btn"
            type="button"
            onClick={() => handleAdjust(-DIFFICULTY_STEP)}
            disabled={!isActive}
          >
            Easier
          </button>
          <button
            className="btn"
            type="button"
            onClick={() => handleAdjust(DIFFICULTY_STEP)}
            disabled={!isActive}
          >
            Harder
          </button>
        </div>
      )}

      <SessionPlanChart plan={state.plan} currentIndex={state.currentIndex} />
      <SessionPlanList plan={state.plan} currentIndex={state.currentIndex} />
    </section>
  );
}
