// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Directives that need a running session, in source order.
 */
export class DeferredQueue {
  private items: string[] = [];

  enqueue(command: string): void {
    this.items.push(command);
  }

  get size(): number {
    return this.items.length;
  }

  toArray(): string[] {
    return [...this.items];
  }

  /**
   * Remove and return every queued command, oldest first.
   */
  drain(): string[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  clear(): void {
    this.items = [];
  }
}
