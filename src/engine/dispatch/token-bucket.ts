/**
 * 채널별 토큰 버킷. 토큰이 없으면 다음 토큰까지의 대기 시간을 돌려준다 —
 * 호출 측은 대상을 큐에 남겨 두고 기다린다.
 */
export class TokenBucket {
  private tokens: number;
  private lastRefillAt: number;

  constructor(
    private ratePerSecond: number,
    private burst: number,
    now: number,
  ) {
    this.tokens = burst;
    this.lastRefillAt = now;
  }

  /** 토큰 1개 소비. 성공 시 0, 실패 시 대기해야 할 ms */
  tryTake(now: number): number {
    this.refill(now);
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return 0;
    }
    const missing = 1 - this.tokens;
    return Math.max(1, Math.ceil((missing / this.ratePerSecond) * 1000));
  }

  /** 설정 변경 반영 — 남은 토큰은 새 burst 로 잘린다 */
  reconfigure(ratePerSecond: number, burst: number, now: number): void {
    this.refill(now);
    this.ratePerSecond = ratePerSecond;
    this.burst = burst;
    this.tokens = Math.min(this.tokens, burst);
  }

  available(now: number): number {
    this.refill(now);
    return this.tokens;
  }

  private refill(now: number): void {
    const elapsedMs = Math.max(0, now - this.lastRefillAt);
    this.tokens = Math.min(
      this.burst,
      this.tokens + (elapsedMs / 1000) * this.ratePerSecond,
    );
    this.lastRefillAt = now;
  }
}
