/**
 * Single-permit async mutex. Waiters are served in arrival order.
 */
export class Lock {
  private permits = 1
  private promiseResolverQueue: Array<() => void> = []

  /**
   * Returns a promise used to wait for a permit to become available.
   */
  public async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits -= 1
      return
    }
    return new Promise<void>((resolver) =>
      this.promiseResolverQueue.push(resolver),
    )
  }

  /**
   * Increases the number of permits by one. If there are other functions
   * waiting, one of them will continue to execute in a future iteration of
   * the event loop.
   */
  public release(): void {
    const nextResolver = this.promiseResolverQueue.shift()
    if (nextResolver) {
      // permit passes straight to the next waiter
      nextResolver()
      return
    }
    this.permits = Math.min(this.permits + 1, 1)
  }

  public get isLocked(): boolean {
    return this.permits === 0
  }

  public async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire()
    try {
      return await fn()
    } finally {
      this.release()
    }
  }
}
