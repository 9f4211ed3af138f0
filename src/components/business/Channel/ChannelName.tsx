import React, { CSSProperties } from 'react';
import { useTranslation } from 'react-i18next';
import { useSubscribable } from '../../../hooks/data/useSubscribable';
import type { ChannelSource } from '../../../types/channel';
import { getChannelDisplayName } from '../../../utils/channel/channelDisplay';

export interface ChannelNameProps {
  channel: ChannelSource;
  currentUserId?: string;
  textStyle?: CSSProperties;
}

/**
 * 频道名称：频道名 → 其他成员名 → “未命名”
 */
export const ChannelName: React.FC<ChannelNameProps> = ({ channel, currentUserId, textStyle }) => {
  const { t } = useTranslation();
  const state = useSubscribable(channel, (snapshot) => snapshot);
  const displayName = getChannelDisplayName(state, currentUserId) ?? t('channelHeader.noTitle');

  return (
    <span className="channel-name" style={textStyle} data-testid="channel-name" title={displayName}>
      {displayName}
    </span>
  );
};

ChannelName.displayName = 'ChannelName';
