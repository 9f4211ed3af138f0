/**
 * ChannelHeader - 频道头部业务组件
 *
 * 职责：展示当前频道的标题、副标题、返回按钮、头像与连接状态横幅
 * 特点：
 * - 频道、客户端、主题都由调用方显式传入
 * - 订阅连接状态，每次状态变化重新渲染，卸载时自动取消订阅
 * - title / subtitle / leading / actions 均可整体替换
 * - 对外报告固定高度 ChannelHeader.preferredHeight
 *
 * @example
 * ```tsx
 * const theme = useChannelHeaderTheme();
 *
 * <ChannelHeader
 *   channel={channelStore}
 *   client={clientStore}
 *   theme={theme}
 *   onTitleTap={openChannelInfo}
 *   showConnectionStateTile
 * />
 * ```
 */

import React, { KeyboardEvent, ReactNode } from 'react';
import { useTranslation } from 'react-i18next';
import {
  AVATAR_RIGHT_PADDING,
  CHANNEL_HEADER_DEFAULTS,
  TITLE_SPACING,
  TOOLBAR_HEIGHT,
  type ChannelHeaderTheme,
} from '../../../constants/channelHeader';
import { useConnectionStatus } from '../../../hooks/data/useConnectionStatus';
import { useSubscribable } from '../../../hooks/data/useSubscribable';
import type { ChannelSource, ChatClientSource } from '../../../types/channel';
import { resolveConnectionBanner } from '../../../utils/channel/connectionBanner';
import { InfoTile } from '../../base/InfoTile';
import { HeaderBar } from '../../base/Layout';
import { ChannelAvatar } from './ChannelAvatar';
import { ChannelBackButton } from './ChannelBackButton';
import { ChannelInfo } from './ChannelInfo';
import { ChannelName } from './ChannelName';
import './ChannelHeader.css';

export interface ChannelHeaderProps {
  /** 当前频道 */
  channel: ChannelSource;
  /** 聊天客户端状态（连接状态、未读数、当前用户） */
  client: ChatClientSource;
  /** 已解析的头部主题 */
  theme: ChannelHeaderTheme;
  /** 是否显示返回按钮（默认 true） */
  showBackButton?: boolean;
  /** 返回按钮回调，默认回退浏览器历史 */
  onBackPressed?: () => void;
  /** 点击标题区域 */
  onTitleTap?: () => void;
  /** 点击头像 */
  onImageTap?: () => void;
  /** 副标题是否显示“正在输入”（默认 true） */
  showTypingIndicator?: boolean;
  /** 是否显示连接状态横幅（默认 false） */
  showConnectionStateTile?: boolean;
  title?: ReactNode;
  subtitle?: ReactNode;
  leading?: ReactNode;
  /** 右侧操作区，默认是频道头像 */
  actions?: ReactNode[];
  backgroundColor?: string;
  className?: string;
}

const ChannelHeaderComponent: React.FC<ChannelHeaderProps> = ({
  channel,
  client,
  theme,
  showBackButton = CHANNEL_HEADER_DEFAULTS.showBackButton,
  onBackPressed,
  onTitleTap,
  onImageTap,
  showTypingIndicator = CHANNEL_HEADER_DEFAULTS.showTypingIndicator,
  showConnectionStateTile = CHANNEL_HEADER_DEFAULTS.showConnectionStateTile,
  title,
  subtitle,
  leading,
  actions,
  backgroundColor,
  className = '',
}) => {
  const { t } = useTranslation();
  const status = useConnectionStatus(client);
  const currentUserId = useSubscribable(client, (state) => state.currentUserId);

  const { labelKey, showStatus } = resolveConnectionBanner(status);

  const leadingElement =
    leading ??
    (showBackButton ? (
      <ChannelBackButton
        client={client}
        onPressed={onBackPressed}
        showUnreads
        color={theme.titleStyle.color}
      />
    ) : (
      <span
        className="channel-header__placeholder"
        style={{ width: 0, height: 0 }}
        data-testid="channel-header-placeholder"
      />
    ));

  const actionElements = actions ?? [
    <div
      key="channel-avatar"
      className="channel-header__avatar"
      style={{ paddingRight: AVATAR_RIGHT_PADDING }}
    >
      <ChannelAvatar
        channel={channel}
        currentUserId={currentUserId}
        onTap={onImageTap}
        borderRadius={theme.avatarTheme?.borderRadius}
        constraints={theme.avatarTheme?.constraints}
      />
    </div>,
  ];

  const handleTitleKeyDown = (event: KeyboardEvent<HTMLDivElement>) => {
    if (onTitleTap && (event.key === 'Enter' || event.key === ' ')) {
      event.preventDefault();
      onTitleTap();
    }
  };

  // 只有传了 onTitleTap 才是可聚焦的按钮
  const titleInteractiveProps = onTitleTap
    ? { role: 'button', tabIndex: 0, onClick: onTitleTap, onKeyDown: handleTitleKeyDown }
    : {};

  const titleBlock = (
    <div
      className="channel-header__title"
      style={{ height: TOOLBAR_HEIGHT }}
      data-testid="channel-header-title"
      {...titleInteractiveProps}
    >
      {title ?? (
        <ChannelName channel={channel} currentUserId={currentUserId} textStyle={theme.titleStyle} />
      )}
      <div className="channel-header__spacer" style={{ height: TITLE_SPACING }} />
      {subtitle ?? (
        <ChannelInfo
          channel={channel}
          client={client}
          showTypingIndicator={showTypingIndicator}
          textStyle={theme.subtitleStyle}
        />
      )}
    </div>
  );

  return (
    <InfoTile
      showMessage={showConnectionStateTile && showStatus}
      message={t(labelKey)}
      backgroundColor={theme.banner.colors[status]}
      textColor={theme.banner.textColor}
    >
      <HeaderBar
        className={`channel-header ${className}`}
        height={TOOLBAR_HEIGHT}
        backgroundColor={backgroundColor ?? theme.color}
        leading={leadingElement}
        title={titleBlock}
        actions={actionElements}
      />
    </InfoTile>
  );
};

ChannelHeaderComponent.displayName = 'ChannelHeader';

export const ChannelHeader = Object.assign(ChannelHeaderComponent, {
  /** 固定高度，宿主布局据此预留空间 */
  preferredHeight: TOOLBAR_HEIGHT,
});
