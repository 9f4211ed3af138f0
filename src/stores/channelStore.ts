import { createStore } from 'zustand/vanilla';
import type { ChannelMember, ChannelSnapshot, ChannelUser } from '../types/channel';

interface ChannelActions {
  setName: (name: string | undefined) => void;
  setImage: (image: string | undefined) => void;
  /** 按 user.id 新增或替换成员 */
  upsertMember: (member: ChannelMember) => void;
  removeMember: (userId: string) => void;
  setMemberPresence: (userId: string, online: boolean, lastActive?: Date) => void;
  startTyping: (user: ChannelUser) => void;
  stopTyping: (userId: string) => void;
}

export type ChannelState = ChannelSnapshot & ChannelActions;

export type ChannelInit = Pick<ChannelSnapshot, 'id' | 'type'> & Partial<ChannelSnapshot>;

/**
 * 单个频道的状态 store
 *
 * memberCount 默认跟随 members 长度；成员分页加载时可以显式传入更大的总数。
 */
export const createChannelStore = (initial: ChannelInit) =>
  createStore<ChannelState>()((set) => {
    const members = initial.members ?? [];

    return {
      name: undefined,
      image: undefined,
      isDistinct: false,
      typingUsers: [],
      ...initial,
      members,
      memberCount: initial.memberCount ?? members.length,

      setName: (name) => set({ name }),

      setImage: (image) => set({ image }),

      upsertMember: (member) =>
        set((state) => {
          const exists = state.members.some((m) => m.user.id === member.user.id);
          const nextMembers = exists
            ? state.members.map((m) => (m.user.id === member.user.id ? member : m))
            : [...state.members, member];
          return {
            members: nextMembers,
            memberCount: exists ? state.memberCount : state.memberCount + 1,
          };
        }),

      removeMember: (userId) =>
        set((state) => {
          if (!state.members.some((m) => m.user.id === userId)) {
            return state;
          }
          return {
            members: state.members.filter((m) => m.user.id !== userId),
            memberCount: Math.max(0, state.memberCount - 1),
            typingUsers: state.typingUsers.filter((u) => u.id !== userId),
          };
        }),

      setMemberPresence: (userId, online, lastActive) =>
        set((state) => ({
          members: state.members.map((m) =>
            m.user.id === userId
              ? { ...m, online, lastActive: lastActive ?? m.lastActive }
              : m
          ),
        })),

      startTyping: (user) =>
        set((state) =>
          state.typingUsers.some((u) => u.id === user.id)
            ? state
            : { typingUsers: [...state.typingUsers, user] }
        ),

      stopTyping: (userId) =>
        set((state) =>
          state.typingUsers.some((u) => u.id === userId)
            ? { typingUsers: state.typingUsers.filter((u) => u.id !== userId) }
            : state
        ),
    };
  });

export type ChannelStore = ReturnType<typeof createChannelStore>;
