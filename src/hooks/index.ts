/**
 * Hooks 统一导出
 *
 * - data: 外部数据源订阅（连接状态、频道状态）
 * - utils: 通用工具（相对时间、主题）
 */

export { useSubscribable, useConnectionStatus } from './data';

export { useRelativeTime, getRelativeTime, useChannelHeaderTheme } from './utils';
export type { RelativeTime } from './utils';
