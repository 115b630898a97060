/** 외부 타이밍 소스: tick 이벤트를 주기적으로, terminate는 한 번만 */
export type TickDriver = {
  start(): void;
  /** terminate 신호. 여러 번 불러도 onTerminate는 한 번 */
  stop(): void;
  readonly running: boolean;
};

export type TickDriverOptions = {
  tickMs: number;
  onTick: () => void;
  onTerminate?: () => void;
};

export function createTickDriver({
  tickMs,
  onTick,
  onTerminate,
}: TickDriverOptions): TickDriver {
  let timer: ReturnType<typeof setInterval> | null = null;
  let stopped = false;

  return {
    start() {
      if (timer !== null || stopped) return;
      timer = setInterval(onTick, tickMs);
    },
    stop() {
      if (stopped) return;
      stopped = true;
      if (timer !== null) {
        clearInterval(timer);
        timer = null;
      }
      onTerminate?.();
    },
    get running() {
      return timer !== null;
    },
  };
}
