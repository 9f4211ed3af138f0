/**
 * 数据类 Hooks
 */

export { useSubscribable } from './useSubscribable';
export { useConnectionStatus } from './useConnectionStatus';
