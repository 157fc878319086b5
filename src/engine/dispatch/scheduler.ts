import { Injectable } from '@nestjs/common';

export const SCHEDULER = Symbol('SCHEDULER');

export type CancelTask = () => void;

/** 시계 + 지연 실행. 테스트에서는 수동으로 시간을 진행하는 구현으로 교체한다 */
export interface Scheduler {
  now(): number;
  schedule(delayMs: number, task: () => void): CancelTask;
}

@Injectable()
export class SystemScheduler implements Scheduler {
  now(): number {
    return Date.now();
  }

  schedule(delayMs: number, task: () => void): CancelTask {
    const timer = setTimeout(task, Math.max(0, delayMs));
    timer.unref();
    return () => clearTimeout(timer);
  }
}
