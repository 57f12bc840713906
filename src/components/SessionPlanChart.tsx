import type { SessionPlan } from '../data/exercise';
import { MAX_DIFFICULTY } from '../data/exercise';

interface SessionPlanChartProps {
  plan: SessionPlan;
  currentIndex?: number;
  width?: number;
  height?: number;
}

const DIFFICULTY_STOPS = [
  { max: 0.9, color: '#3B8EA5' },
  { max: 1.2, color: '#5FAF5F' },
  { max: 1.5, color: '#C9A227' },
  { max: 1.8, color: '#E57A1F' },
  { max: Number.POSITIVE_INFINITY, color: '#D64541' },
];

const colorForDifficulty = (difficulty: number) =>
  DIFFICULTY_STOPS.find((stop) => difficulty <= stop.max)?.color ?? '#D64541';

/** One bar per entry: width follows duration, height follows difficulty. */
export function SessionPlanChart({
  plan,
  currentIndex,
  width = 400,
  height = 80,
}: SessionPlanChartProps) {
  const total = plan.totalDurationSeconds;
  if (plan.entries.length === 0 || total <= 0) {
    return (
      <svg width={width} height={height} style={{ opacity: 0.3 }}>
        <text x={width / 2} y={height / 2} textAnchor="middle" fill="#666">
          No plan
        </text>
      </svg>
    );
  }

  const scaleX = (seconds: number) => (seconds / total) * width;
  const scaleHeight = (difficulty: number) => (difficulty / MAX_DIFFICULTY) * (height - 4);

  let cursor = 0;
  const bars = plan.entries.map((entry, index) => {
    const x = scaleX(cursor);
    cursor += entry.durationSeconds;
    const barHeight = scaleHeight(entry.exercise.difficulty);
    return {
      key: `${index}-${entry.exercise.name}`,
      x,
      width: Math.max(1, scaleX(entry.durationSeconds) - 1),
      y: height - barHeight,
      height: barHeight,
      color: colorForDifficulty(entry.exercise.difficulty),
      isCurrent: index === currentIndex,
      label: `${entry.exercise.name} (${entry.durationSeconds}s)`,
    };
  });

  return (
    <svg
      className="session-plan-chart"
      width={width}
      height={height}
      style={{ display: 'block' }}
      viewBox={`0 0 ${width} ${height}`}
      role="img"
      aria-label="Session plan"
    >
      {bars.map((bar) => (
        <rect
          key={bar.key}
          x={bar.x}
          y={bar.y}
          width={bar.width}
          height={bar.height}
          fill={bar.color}
          opacity={bar.isCurrent ? 1 : 0.55}
          stroke={bar.isCurrent ? '#65c7ff' : 'none'}
          strokeWidth={bar.isCurrent ? 2 : 0}
        >
          <title>{bar.label}</title>
        </rect>
      ))}
    </svg>
  );
}
