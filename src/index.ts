/**
 * 频道头部组件库入口
 */

export * from './components';
export * from './hooks';

export { createChatClientStore } from './stores/chatClientStore';
export type { ChatClientState, ChatClientStore } from './stores/chatClientStore';
export { createChannelStore } from './stores/channelStore';
export type { ChannelInit, ChannelState, ChannelStore } from './stores/channelStore';
export { useThemeStore, calculateEffectiveTheme } from './stores/themeStore';
export type { Theme } from './stores/themeStore';

export * from './constants/channelHeader';
export * from './types/channel';

export { resolveConnectionBanner } from './utils/channel/connectionBanner';
export type { ConnectionBanner, ConnectionLabelKey } from './utils/channel/connectionBanner';
export {
  countOnlineMembers,
  getChannelDisplayName,
  getDirectMessagePeer,
  getInitials,
  getOtherMembers,
  getTypingUsers,
} from './utils/channel/channelDisplay';
export { watchNetworkStatus } from './utils/network/watchNetworkStatus';
export { EventManager, createEventManager } from './utils/events/eventManager';
export type { ListenerTarget } from './utils/events/eventManager';

export { default as i18n, createI18n, getDefaultLanguage } from './i18n/config';
export type { SupportedLanguage } from './i18n/config';
