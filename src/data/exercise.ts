export const MIN_EXERCISE_SECONDS = 20;
export const MAX_EXERCISE_SECONDS = 120;

export const MIN_DIFFICULTY = 0.5;
export const MAX_DIFFICULTY = 2.0;
export const DIFFICULTY_STEP = 0.1;

export const DEFAULT_SESSION_MINUTES = 5;

// Equipment entry meaning "no equipment required"; ignored when filtering.
export const NO_EQUIPMENT = 'None';

export type Exercise = {
  name: string;
  difficulty: number;
  equipment: string[];
  enabled?: boolean;
};

export type ScheduledExercise = {
  exercise: Exercise;
  durationSeconds: number;
};

export type SessionPlan = {
  entries: ScheduledExercise[];
  totalDurationSeconds: number;
};

export type ShortSessionPolicy = 'extend' | 'reject';

export type SessionConfig = {
  durationSeconds: number;
  equipmentFilter?: readonly string[];
  // Nominal seconds per difficulty unit; when set, the selection repeats the
  // exercise list until this pacing fills the session.
  secondsPerDifficulty?: number;
  shortSessionPolicy?: ShortSessionPolicy;
};

export type SessionPhase = 'not-started' | 'running' | 'paused' | 'completed';

export type TimerState = {
  plan: SessionPlan;
  currentIndex: number;
  remainingSeconds: number;
  totalElapsedSeconds: number;
  phase: SessionPhase;
};

export const defaultExercises: Exercise[] = [
  { name: 'Burpees', difficulty: 1.8, equipment: [NO_EQUIPMENT] },
  { name: 'High Knees', difficulty: 0.9, equipment: [NO_EQUIPMENT] },
  { name: 'Jumping Jacks', difficulty: 0.8, equipment: [NO_EQUIPMENT] },
  { name: 'Lunges', difficulty: 1.0, equipment: [NO_EQUIPMENT] },
  { name: 'Mountain Climbers', difficulty: 1.3, equipment: [NO_EQUIPMENT] },
  { name: 'Plank', difficulty: 1.5, equipment: [NO_EQUIPMENT] },
  { name: 'Push-ups', difficulty: 1.2, equipment: [NO_EQUIPMENT] },
  { name: 'Sit-ups', difficulty: 1.0, equipment: [NO_EQUIPMENT] },
  { name: 'Squats', difficulty: 1.0, equipment: [NO_EQUIPMENT] },
  { name: 'Wall Sit', difficulty: 1.4, equipment: ['Wall'] },
];
