import { describe, expect, test } from '@jest/globals';
import {
  countOnlineMembers,
  getChannelDisplayName,
  getDirectMessagePeer,
  getInitials,
  getOtherMembers,
  getTypingUsers,
} from '../channelDisplay';
import type { ChannelSnapshot } from '../../../types/channel';
import { alice, bob, carol, CURRENT_USER_ID, me, member } from '../../../../test/jest/fixtures';

const channel = (overrides: Partial<ChannelSnapshot> = {}): ChannelSnapshot => ({
  id: 'general',
  type: 'messaging',
  isDistinct: false,
  members: [me, alice, bob],
  memberCount: 3,
  typingUsers: [],
  ...overrides,
});

describe('channelDisplay', () => {
  test('getOtherMembers 排除当前用户', () => {
    expect(getOtherMembers(channel(), CURRENT_USER_ID)).toEqual([alice, bob]);
  });

  test('getChannelDisplayName 优先使用频道名（去除首尾空白）', () => {
    expect(getChannelDisplayName(channel({ name: '  Design  ' }), CURRENT_USER_ID)).toBe('Design');
  });

  test('getChannelDisplayName 无频道名时拼接其他成员', () => {
    expect(getChannelDisplayName(channel({ name: '   ' }), CURRENT_USER_ID)).toBe('Alice, Bob');
  });

  test('getChannelDisplayName 成员无名字时使用 id', () => {
    const nameless = member('u-zed', undefined);
    expect(getChannelDisplayName(channel({ members: [me, nameless] }), CURRENT_USER_ID)).toBe('u-zed');
  });

  test('getChannelDisplayName 只有自己时返回 null', () => {
    expect(getChannelDisplayName(channel({ members: [me] }), CURRENT_USER_ID)).toBeNull();
  });

  test('getDirectMessagePeer 只对两人私聊生效', () => {
    const dm = channel({ isDistinct: true, members: [me, carol], memberCount: 2 });
    expect(getDirectMessagePeer(dm, CURRENT_USER_ID)).toBe(carol);
    expect(getDirectMessagePeer(channel({ members: [me, carol], memberCount: 2 }), CURRENT_USER_ID)).toBeNull();
    expect(getDirectMessagePeer(channel({ isDistinct: true }), CURRENT_USER_ID)).toBeNull();
  });

  test('getTypingUsers 排除自己', () => {
    const state = channel({ typingUsers: [me.user, alice.user] });
    expect(getTypingUsers(state, CURRENT_USER_ID)).toEqual([alice.user]);
  });

  test('countOnlineMembers', () => {
    expect(countOnlineMembers(channel())).toBe(2);
  });

  test('getInitials 最多取两个首字母', () => {
    expect(getInitials('alice cooper band')).toBe('AC');
    expect(getInitials('Alice, Bob')).toBe('AB');
    expect(getInitials('  ')).toBe('');
  });
});
