type LoopArgs = {
  intervalMs: number;
  rotateIntervalMs: number;
  redrawIfDirty: () => void;
  rotateLog: () => Promise<void>;
};

type LoopDeps = {
  now?: () => number;
};

export const createDashboardLoop = (
  { intervalMs, rotateIntervalMs, redrawIfDirty, rotateLog }: LoopArgs,
  deps: LoopDeps = {},
) => {
  const now = deps.now ?? Date.now;
  let timer: NodeJS.Timeout | null = null;
  let tickRunning = false;
  let lastRotationAt = 0;

  const tick = async () => {
    if (tickRunning) {
      return;
    }
    tickRunning = true;
    try {
      redrawIfDirty();
      const current = now();
      if (current - lastRotationAt >= rotateIntervalMs) {
        lastRotationAt = current;
        await Promise.allSettled([rotateLog()]);
      }
    } finally {
      tickRunning = false;
    }
  };

  const start = () => {
    if (timer) return;
    lastRotationAt = now();
    timer = setInterval(() => {
      void tick();
    }, intervalMs);
  };

  const stop = () => {
    if (timer) {
      clearInterval(timer);
      timer = null;
    }
  };

  return { start, stop };
};
