import { renderHook, act } from '@testing-library/react';

import type { SessionPlan } from '../data/exercise';
import { useSessionController } from '../hooks/useSessionController';

describe('useSessionController', () => {
  const plan: SessionPlan = {
    entries: [
      { exercise: { name: 'Squats', difficulty: 1.0, equipment: [] }, durationSeconds: 3 },
      { exercise: { name: 'Plank', difficulty: 1.5, equipment: [] }, durationSeconds: 2 },
    ],
    totalDurationSeconds: 5,
  };

  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('exposes the initial state without ticking', () => {
    const { result } = renderHook(() => useSessionController(plan));

    act(() => {
      vi.advanceTimersByTime(3000);
    });

    expect(result.current.state?.phase).toBe('not-started');
    expect(result.current.state?.remainingSeconds).toBe(3);
    expect(result.current.currentEntry?.exercise.name).toBe('Squats');
    expect(result.current.nextEntry?.exercise.name).toBe('Plank');
    expect(result.current.remainingSessionSec).toBe(5);
  });

  it('counts down once per second while running', () => {
    const { result } = renderHook(() => useSessionController(plan));

    act(() => {
      result.current.start();
    });
    act(() => {
      vi.advanceTimersByTime(1000);
    });

    expect(result.current.state?.remainingSeconds).toBe(2);
    expect(result.current.state?.totalElapsedSeconds).toBe(1);
    expect(result.current.progress).toBe(20);
  });

  it('reports exercise changes and completion', () => {
    const onExerciseChange = vi.fn();
    const onComplete = vi.fn();
    const { result } = renderHook(() =>
      useSessionController(plan, { onExerciseChange, onComplete })
    );

    act(() => {
      result.current.start();
    });
    act(() => {
      vi.advanceTimersByTime(3000);
    });

    expect(result.current.currentEntry?.exercise.name).toBe('Plank');
    expect(onExerciseChange).toHaveBeenCalledTimes(2);
    expect(onExerciseChange).toHaveBeenLastCalledWith(plan.entries[1], 1);

    act(() => {
      vi.advanceTimersByTime(2000);
    });

    expect(result.current.state?.phase).toBe('completed');
    expect(onComplete).toHaveBeenCalledWith(5);

    act(() => {
      vi.advanceTimersByTime(5000);
    });
    expect(result.current.state?.totalElapsedSeconds).toBe(5);
  });

  it('holds the countdown while paused', () => {
    const { result } = renderHook(() => useSessionController(plan));

    act(() => {
      result.current.start();
    });
    act(() => {
      vi.advanceTimersByTime(1000);
    });
    act(() => {
      result.current.pause();
    });
    act(() => {
      vi.advanceTimersByTime(5000);
    });

    expect(result.current.state?.phase).toBe('paused');
    expect(result.current.state?.remainingSeconds).toBe(2);
  });

  it('returns an empty state without a plan', () => {
    const { result } = renderHook(() => useSessionController(null));
    expect(result.current.state).toBeNull();
    expect(result.current.progress).toBe(0);
    expect(result.current.adjustDifficulty(0.1)).toBeNull();
  });
});
