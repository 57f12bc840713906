import {
  MAX_EXERCISE_SECONDS,
  MIN_EXERCISE_SECONDS,
  type Exercise,
  type ScheduledExercise,
  type SessionConfig,
  type SessionPlan,
  type ShortSessionPolicy,
} from '../data/exercise';
import { EmptyLibraryError, InvalidConfigurationError } from './errors';
import { getEligibleExercises, validateLibrary } from './exercise';

type ResolvedConfig = {
  durationSeconds: number;
  equipmentFilter?: readonly string[];
  secondsPerDifficulty?: number;
  shortSessionPolicy: ShortSessionPolicy;
};

const sum = (values: readonly number[]) =>
  values.reduce((total, value) => total + value, 0);

export const clampDuration = (seconds: number) =>
  Math.min(MAX_EXERCISE_SECONDS, Math.max(MIN_EXERCISE_SECONDS, seconds));

export const getPlanDurationSec = (entries: readonly ScheduledExercise[]) =>
  sum(entries.map((entry) => entry.durationSeconds));

const resolveConfig = (config: SessionConfig): ResolvedConfig => {
  const { durationSeconds } = config;
  if (!Number.isInteger(durationSeconds) || durationSeconds <= 0) {
    throw new InvalidConfigurationError(
      'Session duration must be a positive whole number of seconds.'
    );
  }
  const { secondsPerDifficulty } = config;
  if (
    secondsPerDifficulty !== undefined &&
    (!Number.isFinite(secondsPerDifficulty) || secondsPerDifficulty <= 0)
  ) {
    throw new InvalidConfigurationError('secondsPerDifficulty must be a positive number.');
  }
  const shortSessionPolicy = config.shortSessionPolicy ?? 'extend';
  if (shortSessionPolicy === 'reject' && durationSeconds < MIN_EXERCISE_SECONDS) {
    throw new InvalidConfigurationError(
      `Session duration must be at least ${MIN_EXERCISE_SECONDS} seconds.`
    );
  }
  if (
    config.equipmentFilter !== undefined &&
    !config.equipmentFilter.every((item) => typeof item === 'string')
  ) {
    throw new InvalidConfigurationError('Equipment filter must only contain strings.');
  }
  return {
    durationSeconds,
    equipmentFilter: config.equipmentFilter,
    secondsPerDifficulty,
    shortSessionPolicy,
  };
};

/** Ascending difficulty; `Array.prototype.sort` is stable, so ties keep input order. */
export const sortByDifficulty = (exercises: readonly Exercise[]) =>
  [...exercises].sort((a, b) => a.difficulty - b.difficulty);

const canAddInstance = (count: number, totalSeconds: number) =>
  (count + 1) * MIN_EXERCISE_SECONDS <= totalSeconds;

/**
 * Walks the sorted list start to end so every exercise is selected once.
 * With `secondsPerDifficulty` set, it keeps walking, over and over, until the
 * nominal time of the selection reaches the session length. Returns indices
 * into `sorted`. Never selects more instances than can each get the minimum
 * duration.
 */
export const selectRoundRobin = (
  sorted: readonly Exercise[],
  totalSeconds: number,
  secondsPerDifficulty?: number
): number[] => {
  const selection: number[] = [];
  let nominalSeconds = 0;
  const wantsMore = () =>
    selection.length < sorted.length ||
    (secondsPerDifficulty !== undefined && nominalSeconds < totalSeconds);

  while (selection.length === 0 || wantsMore()) {
    if (selection.length > 0 && !canAddInstance(selection.length, totalSeconds)) {
      break;
    }
    const index = selection.length % sorted.length;
    selection.push(index);
    nominalSeconds += (secondsPerDifficulty ?? 0) * sorted[index].difficulty;
  }
  return selection;
};

export const allocateRawDurations = (
  difficulties: readonly number[],
  totalSeconds: number
) => {
  const baseTime = totalSeconds / sum(difficulties);
  return difficulties.map((difficulty) => baseTime * difficulty);
};

/**
 * An allocation above the maximum is spread over further occurrences: the
 * round-robin continues, which lowers the per-unit base time, until every
 * allocation fits. New occurrences follow the cycle, so no two land side by
 * side and coverage order is kept.
 */
export const splitOverflow = (
  sorted: readonly Exercise[],
  selection: readonly number[],
  totalSeconds: number
): number[] => {
  const next = [...selection];
  const hasOverflow = () =>
    allocateRawDurations(
      next.map((index) => sorted[index].difficulty),
      totalSeconds
    ).some((seconds) => seconds > MAX_EXERCISE_SECONDS);

  while (hasOverflow() && canAddInstance(next.length, totalSeconds)) {
    next.push(next.length % sorted.length);
  }
  return next;
};

/**
 * Moves `targetSeconds - sum(durations)` one second at a time across the
 * entries, easiest first, wrapping until nothing is left or no entry can move
 * without leaving [MIN_EXERCISE_SECONDS, MAX_EXERCISE_SECONDS].
 */
export const reconcileDurations = (
  durations: readonly number[],
  difficulties: readonly number[],
  targetSeconds: number
): number[] => {
  const result = [...durations];
  const order = result
    .map((_, index) => index)
    .sort((a, b) => difficulties[a] - difficulties[b] || a - b);
  let delta = targetSeconds - sum(result);

  while (delta !== 0) {
    const step = delta > 0 ? 1 : -1;
    let moved = false;
    for (const index of order) {
      if (delta === 0) {
        break;
      }
      const candidate = result[index] + step;
      if (candidate < MIN_EXERCISE_SECONDS || candidate > MAX_EXERCISE_SECONDS) {
        continue;
      }
      result[index] = candidate;
      delta -= step;
      moved = true;
    }
    if (!moved) {
      break;
    }
  }
  return result;
};

/**
 * Returns the positions of `selection` in playing order. The selection is a
 * prefix of the sorted cycle; within the first block (the final partial pass,
 * or the whole cycle when passes are complete) the easiest exercise stays
 * first and the next easiest moves to the end, so the session opens and
 * closes on the lightest work. Every pass uses the same order, which keeps
 * the cycle intact.
 */
export const arrangeProgressively = (
  selection: readonly number[],
  cycleLength: number
): number[] => {
  const positions = selection.map((_, position) => position);
  const count = selection.length;
  if (count < 3) {
    return positions;
  }
  const remainder = count % cycleLength;
  const block = count <= cycleLength ? count : remainder > 0 ? remainder : cycleLength;
  if (block < 3) {
    return positions;
  }

  const rank = (sortedIndex: number) => {
    if (sortedIndex === 0) {
      return 0;
    }
    if (sortedIndex === 1) {
      return block - 1;
    }
    return sortedIndex < block ? sortedIndex - 1 : sortedIndex;
  };

  const arranged: number[] = [];
  for (let start = 0; start < count; start += cycleLength) {
    const pass = positions.slice(start, start + cycleLength);
    pass.sort((a, b) => rank(selection[a]) - rank(selection[b]));
    arranged.push(...pass);
  }
  return arranged;
};

const copyExercise = (exercise: Exercise): Exercise => ({
  ...exercise,
  equipment: [...exercise.equipment],
});

export const generateSession = (
  config: SessionConfig,
  libraryExercises: readonly Exercise[]
): SessionPlan => {
  const { durationSeconds, equipmentFilter, secondsPerDifficulty } =
    resolveConfig(config);
  const library = validateLibrary(libraryExercises);
  const eligible = getEligibleExercises(library, equipmentFilter);
  if (eligible.length === 0) {
    throw new EmptyLibraryError();
  }

  const sorted = sortByDifficulty(eligible);
  const selection = splitOverflow(
    sorted,
    selectRoundRobin(sorted, durationSeconds, secondsPerDifficulty),
    durationSeconds
  );
  const difficulties = selection.map((index) => sorted[index].difficulty);
  const clamped = allocateRawDurations(difficulties, durationSeconds).map((seconds) =>
    clampDuration(Math.floor(seconds))
  );
  const durations = reconcileDurations(clamped, difficulties, durationSeconds);

  const entries = arrangeProgressively(selection, sorted.length).map((position) => ({
    exercise: copyExercise(sorted[selection[position]]),
    durationSeconds: durations[position],
  }));

  return {
    entries,
    totalDurationSeconds: getPlanDurationSec(entries),
  };
};

export const minutesToSeconds = (minutes: number) => Math.round(minutes * 60);
