import type { SessionPlan } from '../data/exercise';
import { formatDuration } from '../utils/time';

interface SessionPlanListProps {
  plan: SessionPlan;
  currentIndex: number;
}

export function SessionPlanList({ plan, currentIndex }: SessionPlanListProps) {
  return (
    <ol className="session-plan-list">
      {plan.entries.map((entry, index) => {
        const status =
          index < currentIndex ? 'done' : index === currentIndex ? 'current' : 'upcoming';
        return (
          <li
            key={`${index}-${entry.exercise.name}`}
            className={`plan-entry plan-entry-${status}`}
            aria-current={status === 'current' ? 'step' : undefined}
          >
            <span className="plan-entry-name">{entry.exercise.name}</span>
            <span className="plan-entry-difficulty">×{entry.exercise.difficulty.toFixed(1)}</span>
            <span className="plan-entry-duration">{formatDuration(entry.durationSeconds)}</span>
          </li>
        );
      })}
    </ol>
  );
}
