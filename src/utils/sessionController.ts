import {
  MAX_EXERCISE_SECONDS,
  MIN_EXERCISE_SECONDS,
  type Exercise,
  type ScheduledExercise,
  type SessionPhase,
  type SessionPlan,
  type TimerState,
} from '../data/exercise';
import { InvalidConfigurationError } from './errors';
import { clampDifficulty, getEligibleExercises } from './exercise';
import {
  clampDuration,
  getPlanDurationSec,
  reconcileDurations,
  sortByDifficulty,
} from './sessionGenerator';

export type SessionEventMap = {
  tick: { remainingSeconds: number; totalElapsedSeconds: number; currentIndex: number };
  'exercise-change': { index: number; entry: ScheduledExercise };
  complete: { totalElapsedSeconds: number };
  'phase-change': { phase: SessionPhase; previousPhase: SessionPhase };
  'plan-change': { plan: SessionPlan };
};

export type SessionEventType = keyof SessionEventMap;

export type SessionListener<K extends SessionEventType> = (
  payload: SessionEventMap[K]
) => void;

type ListenerRegistry = { [K in SessionEventType]: Set<SessionListener<K>> };

/** The slice of the exercise library the controller reads and writes. */
export interface LibraryGateway {
  getExercises: () => readonly Exercise[];
  updateDifficulty: (name: string, difficulty: number) => void;
}

export type SessionControllerOptions = {
  library?: LibraryGateway;
  equipmentFilter?: readonly string[];
};

const createRegistry = (): ListenerRegistry => ({
  tick: new Set<SessionListener<'tick'>>(),
  'exercise-change': new Set<SessionListener<'exercise-change'>>(),
  complete: new Set<SessionListener<'complete'>>(),
  'phase-change': new Set<SessionListener<'phase-change'>>(),
  'plan-change': new Set<SessionListener<'plan-change'>>(),
});

const assertPlan = (plan: SessionPlan) => {
  if (plan.entries.length === 0) {
    throw new InvalidConfigurationError('A session plan needs at least one exercise.');
  }
  plan.entries.forEach((entry, index) => {
    if (!Number.isInteger(entry.durationSeconds) || entry.durationSeconds <= 0) {
      throw new InvalidConfigurationError(
        `entries[${index}].durationSeconds must be a positive whole number.`
      );
    }
  });
};

/** Splits `seconds` into the fewest entries that each fit the duration bounds. */
const splitIntoChunks = (seconds: number) => {
  if (seconds <= MIN_EXERCISE_SECONDS) {
    return [MIN_EXERCISE_SECONDS];
  }
  const count = Math.ceil(seconds / MAX_EXERCISE_SECONDS);
  const base = Math.floor(seconds / count);
  const extra = seconds - base * count;
  return Array.from({ length: count }, (_, index) => base + (index < extra ? 1 : 0));
};

/** Copies a plan into frozen records the controller can hand out as state. */
const freezePlan = (plan: SessionPlan): SessionPlan => {
  const entries = plan.entries.map((entry) => {
    const equipment = [...entry.exercise.equipment];
    Object.freeze(equipment);
    const exercise = { ...entry.exercise, equipment };
    Object.freeze(exercise);
    const scheduled = { exercise, durationSeconds: entry.durationSeconds };
    Object.freeze(scheduled);
    return scheduled;
  });
  Object.freeze(entries);
  const frozen = { entries, totalDurationSeconds: getPlanDurationSec(entries) };
  Object.freeze(frozen);
  return frozen;
};

/**
 * Owns the timer state for one session plan. Driven by an external clock
 * through `tick()`; commands that do not apply to the current phase are
 * ignored and report `false`.
 */
export class SessionController {
  private readonly initialPlan: SessionPlan;
  private readonly library?: LibraryGateway;
  private readonly equipmentFilter?: readonly string[];
  private readonly listeners: ListenerRegistry = createRegistry();

  private plan: SessionPlan;
  private currentIndex = 0;
  private remainingSeconds: number;
  private totalElapsedSeconds = 0;
  private skippedSeconds = 0;
  private phase: SessionPhase = 'not-started';

  constructor(plan: SessionPlan, options: SessionControllerOptions = {}) {
    assertPlan(plan);
    this.initialPlan = freezePlan(plan);
    this.plan = this.initialPlan;
    this.remainingSeconds = this.plan.entries[0].durationSeconds;
    this.library = options.library;
    this.equipmentFilter = options.equipmentFilter;
  }

  on<K extends SessionEventType>(type: K, listener: SessionListener<K>): () => void {
    this.listeners[type].add(listener);
    return () => {
      this.listeners[type].delete(listener);
    };
  }

  getState(): TimerState {
    return {
      plan: this.plan,
      currentIndex: this.currentIndex,
      remainingSeconds: this.remainingSeconds,
      totalElapsedSeconds: this.totalElapsedSeconds,
      phase: this.phase,
    };
  }

  getCurrentEntry(): ScheduledExercise {
    return this.plan.entries[this.currentIndex];
  }

  getNextEntry(): ScheduledExercise | undefined {
    return this.plan.entries[this.currentIndex + 1];
  }

  /** Seconds still to be worked: the current entry's remainder plus every later entry. */
  getRemainingSessionSeconds() {
    return (
      this.remainingSeconds +
      getPlanDurationSec(this.plan.entries.slice(this.currentIndex + 1))
    );
  }

  progressPercentage() {
    const totalSeconds = this.plan.totalDurationSeconds + this.skippedSeconds;
    if (totalSeconds <= 0) {
      return 0;
    }
    const percentage = Math.round((100 * this.totalElapsedSeconds) / totalSeconds);
    return Math.min(100, Math.max(0, percentage));
  }

  start() {
    if (this.phase !== 'not-started' && this.phase !== 'paused') {
      return false;
    }
    const wasNotStarted = this.phase === 'not-started';
    this.setPhase('running');
    if (wasNotStarted) {
      this.emit('exercise-change', {
        index: this.currentIndex,
        entry: this.getCurrentEntry(),
      });
    }
    return true;
  }

  pause() {
    if (this.phase !== 'running') {
      return false;
    }
    this.setPhase('paused');
    return true;
  }

  restart() {
    const planChanged = this.plan !== this.initialPlan;
    this.plan = this.initialPlan;
    this.currentIndex = 0;
    this.remainingSeconds = this.plan.entries[0].durationSeconds;
    this.totalElapsedSeconds = 0;
    this.skippedSeconds = 0;
    if (planChanged) {
      this.emit('plan-change', { plan: this.plan });
    }
    this.setPhase('not-started');
    return true;
  }

  tick() {
    if (this.phase !== 'running') {
      return false;
    }
    this.remainingSeconds -= 1;
    this.totalElapsedSeconds += 1;
    this.emit('tick', {
      remainingSeconds: this.remainingSeconds,
      totalElapsedSeconds: this.totalElapsedSeconds,
      currentIndex: this.currentIndex,
    });
    if (this.remainingSeconds > 0) {
      return true;
    }

    if (this.currentIndex >= this.plan.entries.length - 1) {
      this.setPhase('completed');
      this.emit('complete', { totalElapsedSeconds: this.totalElapsedSeconds });
      return true;
    }

    this.currentIndex += 1;
    this.remainingSeconds = this.getCurrentEntry().durationSeconds;
    this.emit('exercise-change', {
      index: this.currentIndex,
      entry: this.getCurrentEntry(),
    });
    return true;
  }

  /**
   * Drops the current entry and hands its remaining seconds to the entries
   * after it, in proportion to their durations. When they cannot absorb it
   * (none left, or all at the maximum) new entries are appended from the
   * library. The previous plan object is left untouched.
   */
  skipCurrent() {
    if (this.phase !== 'running' && this.phase !== 'paused') {
      return false;
    }
    const { entries } = this.plan;
    const skipped = this.getCurrentEntry();
    const leftover = this.remainingSeconds;
    const future = entries.slice(this.currentIndex + 1);

    const redistributed = this.redistribute(future, leftover);
    const tail = [...redistributed.entries];

    const appended =
      redistributed.unplacedSeconds > 0 ? splitIntoChunks(redistributed.unplacedSeconds) : [];
    let previousName: string | undefined =
      tail[tail.length - 1]?.exercise.name ?? entries[this.currentIndex - 1]?.exercise.name;
    appended.forEach((durationSeconds) => {
      const exercise = this.chooseReplacement(skipped.exercise, previousName);
      tail.push({ exercise, durationSeconds });
      previousName = exercise.name;
    });

    // A remainder under the minimum was padded to a full entry; take the
    // padding back out of the later entries.
    const balanced =
      future.length > 0
        ? this.rebalance(tail, getPlanDurationSec(future) + leftover)
        : tail;
    const nextEntries = [...entries.slice(0, this.currentIndex), ...balanced];

    this.skippedSeconds += skipped.durationSeconds - leftover;
    this.plan = freezePlan({
      entries: nextEntries,
      totalDurationSeconds: getPlanDurationSec(nextEntries),
    });
    this.remainingSeconds = this.getCurrentEntry().durationSeconds;
    this.emit('plan-change', { plan: this.plan });
    this.emit('exercise-change', {
      index: this.currentIndex,
      entry: this.getCurrentEntry(),
    });
    return true;
  }

  /**
   * Writes a new difficulty for the current exercise to the library. The
   * running plan and countdown are not changed; returns the stored value.
   */
  adjustDifficulty(delta: number) {
    if (this.phase !== 'running' && this.phase !== 'paused') {
      return null;
    }
    if (!this.library || !Number.isFinite(delta)) {
      return null;
    }
    const { name } = this.getCurrentEntry().exercise;
    const stored = this.library.getExercises().find((exercise) => exercise.name === name);
    if (!stored) {
      return null;
    }
    const difficulty = clampDifficulty(stored.difficulty + delta);
    this.library.updateDifficulty(name, difficulty);
    return difficulty;
  }

  private redistribute(future: readonly ScheduledExercise[], leftover: number) {
    if (future.length === 0) {
      return { entries: [], unplacedSeconds: leftover };
    }
    const futureSeconds = getPlanDurationSec(future);
    const targetSeconds = futureSeconds + leftover;
    const clamped = future.map((entry) =>
      clampDuration(
        Math.floor(entry.durationSeconds + (leftover * entry.durationSeconds) / futureSeconds)
      )
    );
    const durations = reconcileDurations(
      clamped,
      future.map((entry) => entry.exercise.difficulty),
      targetSeconds
    );
    const entries = future.map((entry, index) => ({
      exercise: entry.exercise,
      durationSeconds: durations[index],
    }));
    return {
      entries,
      unplacedSeconds: Math.max(0, targetSeconds - getPlanDurationSec(entries)),
    };
  }

  private rebalance(entries: readonly ScheduledExercise[], targetSeconds: number) {
    const durations = reconcileDurations(
      entries.map((entry) => entry.durationSeconds),
      entries.map((entry) => entry.exercise.difficulty),
      targetSeconds
    );
    return entries.map((entry, index) => ({
      exercise: entry.exercise,
      durationSeconds: durations[index],
    }));
  }

  private chooseReplacement(skipped: Exercise, previousName?: string): Exercise {
    const candidates = sortByDifficulty(
      getEligibleExercises(this.library?.getExercises() ?? [], this.equipmentFilter)
    );
    const choice =
      candidates.find(
        (exercise) => exercise.name !== previousName && exercise.name !== skipped.name
      ) ??
      candidates.find((exercise) => exercise.name !== previousName) ??
      candidates[0] ??
      skipped;
    return { ...choice, equipment: [...choice.equipment] };
  }

  private setPhase(phase: SessionPhase) {
    const previousPhase = this.phase;
    if (previousPhase === phase) {
      return;
    }
    this.phase = phase;
    this.emit('phase-change', { phase, previousPhase });
  }

  private emit<K extends SessionEventType>(type: K, payload: SessionEventMap[K]) {
    this.listeners[type].forEach((listener) => listener(payload));
  }
}
