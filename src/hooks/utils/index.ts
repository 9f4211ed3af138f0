/**
 * 通用工具类 Hooks
 */

export { useRelativeTime, getRelativeTime } from './useRelativeTime';
export type { RelativeTime } from './useRelativeTime';
export { useChannelHeaderTheme } from './useChannelHeaderTheme';
