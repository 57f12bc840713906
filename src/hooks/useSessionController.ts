import { useCallback, useEffect, useMemo, useRef, useState } from 'react';

import type { ScheduledExercise, SessionPlan, TimerState } from '../data/exercise';
import { SessionController, type LibraryGateway } from '../utils/sessionController';

type SessionControllerHookOptions = {
  library?: LibraryGateway;
  equipmentFilter?: readonly string[];
  onExerciseChange?: (entry: ScheduledExercise, index: number) => void;
  onComplete?: (totalElapsedSeconds: number) => void;
};

type SessionControllerHook = {
  state: TimerState | null;
  currentEntry: ScheduledExercise | undefined;
  nextEntry: ScheduledExercise | undefined;
  progress: number;
  remainingSessionSec: number;
  start: () => void;
  pause: () => void;
  restart: () => void;
  skip: () => void;
  adjustDifficulty: (delta: number) => number | null;
};

const TICK_MS = 1000;

export const useSessionController = (
  plan: SessionPlan | null,
  options: SessionControllerHookOptions = {}
): SessionControllerHook => {
  const optionsRef = useRef(options);
  optionsRef.current = options;

  // The gateway reads through the ref so a new library snapshot is seen
  // without rebuilding the controller mid-session.
  const controller = useMemo(() => {
    if (!plan) {
      return null;
    }
    const library: LibraryGateway = {
      getExercises: () => optionsRef.current.library?.getExercises() ?? [],
      updateDifficulty: (name, difficulty) =>
        optionsRef.current.library?.updateDifficulty(name, difficulty),
    };
    return new SessionController(plan, {
      library,
      equipmentFilter: optionsRef.current.equipmentFilter,
    });
  }, [plan]);

  const [state, setState] = useState<TimerState | null>(() => controller?.getState() ?? null);

  useEffect(() => {
    if (!controller) {
      setState(null);
      return undefined;
    }
    const sync = () => setState(controller.getState());
    sync();
    const unsubscribers = [
      controller.on('tick', sync),
      controller.on('phase-change', sync),
      controller.on('plan-change', sync),
      controller.on('exercise-change', ({ entry, index }) => {
        sync();
        optionsRef.current.onExerciseChange?.(entry, index);
      }),
      controller.on('complete', ({ totalElapsedSeconds }) => {
        optionsRef.current.onComplete?.(totalElapsedSeconds);
      }),
    ];
    return () => unsubscribers.forEach((unsubscribe) => unsubscribe());
  }, [controller]);

  const isRunning = state?.phase === 'running';

  useEffect(() => {
    if (!controller || !isRunning) {
      return undefined;
    }
    const intervalId = window.setInterval(() => {
      controller.tick();
    }, TICK_MS);
    return () => window.clearInterval(intervalId);
  }, [controller, isRunning]);

  const start = useCallback(() => {
    controller?.start();
  }, [controller]);

  const pause = useCallback(() => {
    controller?.pause();
  }, [controller]);

  const restart = useCallback(() => {
    controller?.restart();
  }, [controller]);

  const skip = useCallback(() => {
    controller?.skipCurrent();
  }, [controller]);

  const adjustDifficulty = useCallback(
    (delta: number) => controller?.adjustDifficulty(delta) ?? null,
    [controller]
  );

  const currentEntry = state ? state.plan.entries[state.currentIndex] : undefined;
  const nextEntry = state ? state.plan.entries[state.currentIndex + 1] : undefined;

  return {
    state,
    currentEntry,
    nextEntry,
    progress: controller && state ? controller.progressPercentage() : 0,
    remainingSessionSec: controller && state ? controller.getRemainingSessionSeconds() : 0,
    start,
    pause,
    restart,
    skip,
    adjustDifficulty,
  };
};
