import { createStore } from 'zustand/vanilla';
import type { ChatClientSnapshot, ConnectionStatus } from '../types/channel';

interface ChatClientActions {
  setConnectionStatus: (status: ConnectionStatus) => void;
  setCurrentUserId: (userId: string | undefined) => void;
  setTotalUnreadCount: (count: number) => void;
}

export type ChatClientState = ChatClientSnapshot & ChatClientActions;

/**
 * 聊天客户端状态 store
 *
 * 由宿主应用的客户端层写入（连接事件、未读数推送），
 * ChannelHeader 只通过 subscribe / getState 读取。
 */
export const createChatClientStore = (initial: Partial<ChatClientSnapshot> = {}) =>
  createStore<ChatClientState>()((set, get) => ({
    connectionStatus: 'connecting',
    currentUserId: undefined,
    totalUnreadCount: 0,
    ...initial,

    setConnectionStatus: (status) => {
      const previous = get().connectionStatus;
      if (previous === status) {
        return;
      }
      console.log(`🔌 连接状态变更: ${previous} → ${status}`);
      set({ connectionStatus: status });
    },

    setCurrentUserId: (userId) => set({ currentUserId: userId }),

    setTotalUnreadCount: (count) => set({ totalUnreadCount: Math.max(0, Math.floor(count)) }),
  }));

export type ChatClientStore = ReturnType<typeof createChatClientStore>;
