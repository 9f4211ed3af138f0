import { afterEach, beforeEach, describe, expect, jest, test } from '@jest/globals';
import { createChatClientStore } from '../chatClientStore';

describe('chatClientStore', () => {
  let logSpy: jest.SpiedFunction<typeof console.log>;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  test('默认状态为 connecting，未读为 0', () => {
    const store = createChatClientStore();
    expect(store.getState().connectionStatus).toBe('connecting');
    expect(store.getState().totalUnreadCount).toBe(0);
    expect(store.getState().currentUserId).toBeUndefined();
  });

  test('初始值可以覆盖默认值', () => {
    const store = createChatClientStore({ connectionStatus: 'connected', currentUserId: 'u-me' });
    expect(store.getState().connectionStatus).toBe('connected');
    expect(store.getState().currentUserId).toBe('u-me');
  });

  test('状态变化时通知订阅者并记录日志', () => {
    const store = createChatClientStore();
    const listener = jest.fn();
    store.subscribe(listener);

    store.getState().setConnectionStatus('connected');

    expect(listener).toHaveBeenCalledTimes(1);
    expect(store.getState().connectionStatus).toBe('connected');
    expect(logSpy).toHaveBeenCalledWith('🔌 连接状态变更: connecting → connected');
  });

  test('状态不变时不通知', () => {
    const store = createChatClientStore({ connectionStatus: 'connected' });
    const listener = jest.fn();
    store.subscribe(listener);

    store.getState().setConnectionStatus('connected');

    expect(listener).not.toHaveBeenCalled();
    expect(logSpy).not.toHaveBeenCalled();
  });

  test('取消订阅后不再通知', () => {
    const store = createChatClientStore();
    const listener = jest.fn();
    const unsubscribe = store.subscribe(listener);
    unsubscribe();

    store.getState().setConnectionStatus('disconnected');

    expect(listener).not.toHaveBeenCalled();
  });

  test('未读数取整且不小于 0', () => {
    const store = createChatClientStore();
    store.getState().setTotalUnreadCount(3.7);
    expect(store.getState().totalUnreadCount).toBe(3);
    store.getState().setTotalUnreadCount(-2);
    expect(store.getState().totalUnreadCount).toBe(0);
  });
});
