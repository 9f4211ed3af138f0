import type { ChatClientStore } from '../../stores/chatClientStore';
import { createEventManager, type ListenerTarget } from '../events/eventManager';

/**
 * 把浏览器网络事件映射到连接状态
 *
 * - offline → disconnected
 * - online  → connecting（真正连上由客户端层改为 connected）
 *
 * @returns 清理函数
 */
export function watchNetworkStatus(
  store: ChatClientStore,
  target: ListenerTarget = window
): () => void {
  const manager = createEventManager();

  manager.addEventListener(target, 'offline', () => {
    store.getState().setConnectionStatus('disconnected');
  });

  manager.addEventListener(target, 'online', () => {
    if (store.getState().connectionStatus === 'disconnected') {
      store.getState().setConnectionStatus('connecting');
    }
  });

  return () => manager.cleanup();
}
