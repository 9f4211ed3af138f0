/**
 * 频道相关业务组件
 */

export { ChannelHeader } from './ChannelHeader';
export { ChannelName } from './ChannelName';
export { ChannelInfo } from './ChannelInfo';
export { ChannelAvatar } from './ChannelAvatar';
export { ChannelBackButton } from './ChannelBackButton';

export type { ChannelHeaderProps } from './ChannelHeader';
export type { ChannelNameProps } from './ChannelName';
export type { ChannelInfoProps } from './ChannelInfo';
export type { ChannelAvatarProps } from './ChannelAvatar';
export type { ChannelBackButtonProps } from './ChannelBackButton';
