import { afterEach, beforeEach, describe, expect, jest, test } from '@jest/globals';
import { createEventManager } from '../eventManager';

describe('EventManager', () => {
  let logSpy: jest.SpiedFunction<typeof console.log>;
  let warnSpy: jest.SpiedFunction<typeof console.warn>;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
    warnSpy.mockRestore();
  });

  test('注册的监听器能收到事件，返回的函数只移除自己', () => {
    const target = new EventTarget();
    const manager = createEventManager();
    const first = jest.fn();
    const second = jest.fn();

    const removeFirst = manager.addEventListener(target, 'ping', first);
    manager.addEventListener(target, 'ping', second);
    expect(manager.getListenerCount()).toBe(2);

    removeFirst();
    target.dispatchEvent(new Event('ping'));

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
    expect(manager.getListenerCount()).toBe(1);
  });

  test('cleanup 移除全部监听器并拒绝新的注册', () => {
    const target = new EventTarget();
    const manager = createEventManager();
    const handler = jest.fn();

    manager.addEventListener(target, 'ping', handler);
    manager.cleanup();
    target.dispatchEvent(new Event('ping'));

    expect(handler).not.toHaveBeenCalled();
    expect(manager.isActive()).toBe(false);

    manager.addEventListener(target, 'ping', handler);
    expect(manager.getListenerCount()).toBe(0);
    expect(warnSpy).toHaveBeenCalledWith('⚠️ EventManager 已销毁，无法添加新监听器');
  });

  test('重复 cleanup 只警告', () => {
    const manager = createEventManager();
    manager.cleanup();
    manager.cleanup();
    expect(warnSpy).toHaveBeenCalledWith('⚠️ EventManager 已销毁');
  });
});
