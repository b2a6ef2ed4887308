type UpdateLoopHandlers = {
  onStart: () => void;
  onStop: () => void;
  onUpdate: () => void;
  onPause: () => void;
  getIntervalMs: () => number;
};

/**
 * Timer-driven update loop for Node: one onUpdate per interval while
 * running. Uses chained setTimeout so a slow update never overlaps the next.
 */
export const createUpdateLoop = (handlers: UpdateLoopHandlers) => {
  let timeoutId: ReturnType<typeof setTimeout> | null = null;
  let isRunning = false;
  let isPaused = false;

  const { onUpdate, onPause, onStop, onStart, getIntervalMs } = handlers;

  const update = () => {
    timeoutId = null;
    if (!isRunning || isPaused) return;
    onUpdate();
    scheduleNext();
  };

  const scheduleNext = () => {
    if (timeoutId !== null || !isRunning || isPaused) return;
    timeoutId = setTimeout(update, getIntervalMs());
  };

  const stopUpdating = () => {
    if (timeoutId !== null) {
      clearTimeout(timeoutId);
      timeoutId = null;
    }
  };

  const start = () => {
    if (isRunning && !isPaused) return;
    isRunning = true;
    isPaused = false;
    scheduleNext();
    onStart();
  };

  const pause = () => {
    if (!isRunning || isPaused) return;
    isPaused = true;
    stopUpdating();
    onPause();
  };

  const stop = () => {
    if (!isRunning) return;
    stopUpdating();
    isRunning = false;
    isPaused = false;
    onStop();
  };

  return {
    start,
    pause,
    stop,
    isRunning: () => isRunning,
    isPaused: () => isPaused,
  };
};

export type UpdateLoop = ReturnType<typeof createUpdateLoop>;
