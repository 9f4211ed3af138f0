import type { ChatClientSource, ConnectionStatus } from '../../types/channel';
import { useSubscribable } from './useSubscribable';

/**
 * 当前连接状态，每次状态变化触发重新渲染
 */
export function useConnectionStatus(client: ChatClientSource): ConnectionStatus {
  return useSubscribable(client, (state) => state.connectionStatus);
}
