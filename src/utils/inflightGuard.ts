// MARK: - In-Flight Guard
// Keeps duplicate triggers from starting the same computation twice

export type GuardedResult<T> = { started: true; value: T } | { started: false };

export class InflightGuard {
  private readonly active = new Set<string>();

  static key(...parts: string[]): string {
    return parts.join(':');
  }

  /**
   * Runs `task` unless another task holds `key`. The key is released when the
   * task settles, whether it resolved or threw.
   */
  async run<T>(key: string, task: () => Promise<T>): Promise<GuardedResult<T>> {
    if (this.active.has(key)) {
      return { started: false };
    }

    this.active.add(key);
    try {
      const value = await task();
      return { started: true, value };
    } finally {
      this.active.delete(key);
    }
  }

  isActive(key: string): boolean {
    return this.active.has(key);
  }

  getActiveCount(): number {
    return this.active.size;
  }
}
