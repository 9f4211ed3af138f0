import React from 'react';
import { useTranslation } from 'react-i18next';
import type { AvatarTheme } from '../../../constants/channelHeader';
import { useSubscribable } from '../../../hooks/data/useSubscribable';
import type { ChannelSource } from '../../../types/channel';
import {
  getChannelDisplayName,
  getDirectMessagePeer,
} from '../../../utils/channel/channelDisplay';
import { Avatar } from '../../base/Avatar';

export interface ChannelAvatarProps extends AvatarTheme {
  channel: ChannelSource;
  currentUserId?: string;
  onTap?: () => void;
}

/**
 * 频道头像：频道图片，私聊时退回对方头像，再退回首字母
 */
export const ChannelAvatar: React.FC<ChannelAvatarProps> = ({
  channel,
  currentUserId,
  onTap,
  borderRadius,
  constraints,
}) => {
  const { t } = useTranslation();
  const state = useSubscribable(channel, (snapshot) => snapshot);

  const image = state.image ?? getDirectMessagePeer(state, currentUserId)?.user.image;
  const name = getChannelDisplayName(state, currentUserId) ?? t('channelHeader.noTitle');

  return (
    <Avatar
      image={image}
      name={name}
      label={t('channelHeader.avatar')}
      onTap={onTap}
      borderRadius={borderRadius}
      constraints={constraints}
    />
  );
};

ChannelAvatar.displayName = 'ChannelAvatar';
