import type { CancelTask, Scheduler } from '../engine/dispatch/scheduler.js';

interface Task {
  id: number;
  at: number;
  run: () => void;
}

/** 테스트용 시계 — advance() 로만 시간이 흐른다 */
export class ManualScheduler implements Scheduler {
  private time: number;
  private seq = 0;
  private tasks: Task[] = [];

  constructor(start: number = Date.UTC(2025, 0, 1)) {
    this.time = start;
  }

  now(): number {
    return this.time;
  }

  schedule(delayMs: number, task: () => void): CancelTask {
    const entry: Task = { id: ++this.seq, at: this.time + Math.max(0, delayMs), run: task };
    this.tasks.push(entry);
    return () => {
      this.tasks = this.tasks.filter((t) => t.id !== entry.id);
    };
  }

  /** 예약 시각 순서대로 만기 작업을 실행 */
  advance(ms: number): void {
    const until = this.time + ms;
    for (;;) {
      const next = this.tasks
        .filter((t) => t.at <= until)
        .sort((a, b) => a.at - b.at || a.id - b.id)[0];
      if (!next) break;
      this.tasks = this.tasks.filter((t) => t.id !== next.id);
      this.time = Math.max(this.time, next.at);
      next.run();
    }
    this.time = until;
  }

  pending(): number {
    return this.tasks.length;
  }
}
