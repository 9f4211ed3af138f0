/**
 * 频道头部相关的数据类型
 *
 * 组件只读取这些数据，从不修改；数据由外部的聊天客户端写入 store。
 */

/** 客户端与聊天后端的连接状态 */
export type ConnectionStatus = 'connected' | 'connecting' | 'disconnected';

/**
 * 可订阅的数据源
 *
 * zustand 的 vanilla store 天然满足这个接口。
 */
export interface Subscribable<T> {
  getState(): T;
  /** 返回取消订阅函数 */
  subscribe(listener: (state: T, previousState: T) => void): () => void;
}

export interface ChannelUser {
  id: string;
  name?: string;
  image?: string;
}

export interface ChannelMember {
  user: ChannelUser;
  online: boolean;
  lastActive?: Date;
}

export interface ChannelSnapshot {
  id: string;
  type: string;
  name?: string;
  image?: string;
  /** 由成员列表唯一确定的频道（通常是一对一私聊） */
  isDistinct: boolean;
  memberCount: number;
  members: ChannelMember[];
  /** 正在输入的用户（可能包含当前用户自己） */
  typingUsers: ChannelUser[];
}

export interface ChatClientSnapshot {
  connectionStatus: ConnectionStatus;
  currentUserId?: string;
  /** 所有频道的未读总数，显示在返回按钮上 */
  totalUnreadCount: number;
}

export type ChannelSource = Subscribable<ChannelSnapshot>;
export type ChatClientSource = Subscribable<ChatClientSnapshot>;
