/**
 * ChannelInfo - 频道副标题
 *
 * 职责：按连接状态和频道状态展示一行说明
 * - 连接中：正在搜索网络
 * - 已断开：离线
 * - 已连接：有人输入时显示输入提示；私聊显示对方在线状态；群聊显示成员与在线人数
 */

import React, { CSSProperties } from 'react';
import { useTranslation } from 'react-i18next';
import { useConnectionStatus } from '../../../hooks/data/useConnectionStatus';
import { useSubscribable } from '../../../hooks/data/useSubscribable';
import { useRelativeTime } from '../../../hooks/utils/useRelativeTime';
import type { ChannelSource, ChannelUser, ChatClientSource } from '../../../types/channel';
import {
  countOnlineMembers,
  getDirectMessagePeer,
  getTypingUsers,
} from '../../../utils/channel/channelDisplay';

export interface ChannelInfoProps {
  channel: ChannelSource;
  client: ChatClientSource;
  /** 是否显示“正在输入” */
  showTypingIndicator?: boolean;
  textStyle?: CSSProperties;
}

const userLabel = (user: ChannelUser) => user.name ?? user.id;

export const ChannelInfo: React.FC<ChannelInfoProps> = ({
  channel,
  client,
  showTypingIndicator = true,
  textStyle,
}) => {
  const { t } = useTranslation();
  const status = useConnectionStatus(client);
  const currentUserId = useSubscribable(client, (state) => state.currentUserId);
  const state = useSubscribable(channel, (snapshot) => snapshot);

  const peer = getDirectMessagePeer(state, currentUserId);
  const lastSeen = useRelativeTime(peer !== null && !peer.online ? peer.lastActive : undefined);
  const typingUsers = showTypingIndicator ? getTypingUsers(state, currentUserId) : [];

  const renderConnected = (): string => {
    if (typingUsers.length === 1) {
      return t('channelInfo.typingOne', { name: userLabel(typingUsers[0]) });
    }
    if (typingUsers.length === 2) {
      return t('channelInfo.typingTwo', {
        first: userLabel(typingUsers[0]),
        second: userLabel(typingUsers[1]),
      });
    }
    if (typingUsers.length > 2) {
      return t('channelInfo.typingMany', {
        name: userLabel(typingUsers[0]),
        count: typingUsers.length - 1,
      });
    }

    if (peer) {
      if (peer.online) return t('channelInfo.online');
      return lastSeen ? t('channelInfo.lastSeen', { time: lastSeen }) : t('channelInfo.offline');
    }

    return t('channelInfo.membersOnline', {
      members: t('channelInfo.members', { count: state.memberCount }),
      online: countOnlineMembers(state),
    });
  };

  const text =
    status === 'connecting'
      ? t('channelInfo.searchingForNetwork')
      : status === 'disconnected'
        ? t('channelInfo.offline')
        : renderConnected();

  const isTyping = status === 'connected' && typingUsers.length > 0;

  return (
    <span
      className={`channel-info ${isTyping ? 'channel-info--typing' : ''}`}
      style={textStyle}
      data-testid="channel-info"
    >
      {text}
    </span>
  );
};

ChannelInfo.displayName = 'ChannelInfo';
