/**
 * 事件管理器 - 统一登记浏览器事件监听，并在销毁时一次性清理
 *
 * 网络状态监听（online / offline）和系统主题监听（prefers-color-scheme）都走这里。
 *
 * @example
 * ```ts
 * const manager = createEventManager();
 * manager.addEventListener(window, 'offline', handleOffline);
 * // 卸载时
 * manager.cleanup();
 * ```
 */

/** window、document、MediaQueryList 都满足这个形状 */
export interface ListenerTarget {
  addEventListener(
    type: string,
    listener: EventListener,
    options?: boolean | AddEventListenerOptions
  ): void;
  removeEventListener(
    type: string,
    listener: EventListener,
    options?: boolean | EventListenerOptions
  ): void;
}

interface ListenerRecord {
  target: ListenerTarget;
  type: string;
  handler: EventListener;
  options?: boolean | AddEventListenerOptions;
}

export class EventManager {
  private listeners: ListenerRecord[] = [];
  private isDestroyed = false;

  /**
   * 添加事件监听器
   *
   * @returns 只移除该监听器的函数
   */
  addEventListener(
    target: ListenerTarget,
    type: string,
    handler: EventListener,
    options?: boolean | AddEventListenerOptions
  ): () => void {
    if (this.isDestroyed) {
      console.warn('⚠️ EventManager 已销毁，无法添加新监听器');
      return () => {};
    }

    this.listeners.push({ target, type, handler, options });
    target.addEventListener(type, handler, options);

    console.log(`✅ 已注册事件监听器: ${type} (总计: ${this.listeners.length})`);

    return () => this.removeEventListener(target, type, handler);
  }

  removeEventListener(target: ListenerTarget, type: string, handler: EventListener): void {
    const index = this.listeners.findIndex(
      (record) =>
        record.target === target && record.type === type && record.handler === handler
    );

    if (index === -1) {
      return;
    }

    const [record] = this.listeners.splice(index, 1);
    target.removeEventListener(type, handler, record.options);
    console.log(`🗑️ 已移除事件监听器: ${type} (剩余: ${this.listeners.length})`);
  }

  /**
   * 移除全部监听器，之后不能再添加
   */
  cleanup(): void {
    if (this.isDestroyed) {
      console.warn('⚠️ EventManager 已销毁');
      return;
    }

    for (const record of this.listeners) {
      record.target.removeEventListener(record.type, record.handler, record.options);
    }

    console.log(`🧹 已清理 ${this.listeners.length} 个事件监听器`);
    this.listeners = [];
    this.isDestroyed = true;
  }

  getListenerCount(): number {
    return this.listeners.length;
  }

  isActive(): boolean {
    return !this.isDestroyed;
  }
}

export function createEventManager(): EventManager {
  return new EventManager();
}
