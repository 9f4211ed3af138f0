/**
 * 频道展示相关的纯函数
 *
 * 从 ChannelName / ChannelInfo / ChannelAvatar 中抽出，便于单测。
 */

import type { ChannelMember, ChannelSnapshot, ChannelUser } from '../../types/channel';

/**
 * 除当前用户外的成员
 */
export function getOtherMembers(
  channel: ChannelSnapshot,
  currentUserId?: string
): ChannelMember[] {
  return channel.members.filter((member) => member.user.id !== currentUserId);
}

/**
 * 频道标题：优先使用频道名，否则拼接其他成员的名字
 *
 * @returns 无可用名称时返回 null，由调用方决定兜底文案
 */
export function getChannelDisplayName(
  channel: ChannelSnapshot,
  currentUserId?: string
): string | null {
  const name = channel.name?.trim();
  if (name) {
    return name;
  }

  const names = getOtherMembers(channel, currentUserId)
    .map((member) => member.user.name ?? member.user.id)
    .filter((memberName) => memberName.length > 0);

  return names.length > 0 ? names.join(', ') : null;
}

/**
 * 一对一私聊中的对方成员
 */
export function getDirectMessagePeer(
  channel: ChannelSnapshot,
  currentUserId?: string
): ChannelMember | null {
  if (!channel.isDistinct || channel.memberCount !== 2) {
    return null;
  }
  return getOtherMembers(channel, currentUserId)[0] ?? null;
}

/**
 * 正在输入的其他用户（排除自己）
 */
export function getTypingUsers(
  channel: ChannelSnapshot,
  currentUserId?: string
): ChannelUser[] {
  return channel.typingUsers.filter((user) => user.id !== currentUserId);
}

export function countOnlineMembers(channel: ChannelSnapshot): number {
  return channel.members.filter((member) => member.online).length;
}

/**
 * 名称首字母（最多两个），用于无头像时的占位
 */
export function getInitials(name: string): string {
  return name
    .trim()
    .split(/[\s,]+/)
    .filter(Boolean)
    .slice(0, 2)
    .map((part) => part.charAt(0).toUpperCase())
    .join('');
}
