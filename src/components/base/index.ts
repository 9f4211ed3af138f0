/**
 * 基础组件统一导出
 *
 * 这些组件都是：
 * - 不感知频道与连接
 * - API稳定
 * - 可跨项目复用
 */

// 布局组件
export * from './Layout';

// 状态横幅
export * from './InfoTile';

// 返回按钮与头像
export * from './BackButton';
export * from './Avatar';
