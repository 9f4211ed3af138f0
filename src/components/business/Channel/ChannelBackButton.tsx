import React from 'react';
import { useSubscribable } from '../../../hooks/data/useSubscribable';
import type { ChatClientSource } from '../../../types/channel';
import { BackButton } from '../../base/BackButton';

export interface ChannelBackButtonProps {
  client: ChatClientSource;
  onPressed?: () => void;
  showUnreads?: boolean;
  color?: string;
}

/**
 * 绑定客户端未读总数的返回按钮
 */
export const ChannelBackButton: React.FC<ChannelBackButtonProps> = ({
  client,
  onPressed,
  showUnreads = false,
  color,
}) => {
  const unreadCount = useSubscribable(client, (state) => state.totalUnreadCount);

  return (
    <BackButton
      onPressed={onPressed}
      showUnreads={showUnreads}
      unreadCount={unreadCount}
      color={color}
    />
  );
};

ChannelBackButton.displayName = 'ChannelBackButton';
