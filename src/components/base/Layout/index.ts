/**
 * 基础布局组件统一导出
 */

export { HeaderBar } from './HeaderBar';
export type { HeaderBarProps } from './HeaderBar';
