/**
 * 组件统一导出
 *
 * - base/: 基础组件（不感知频道，可跨项目复用）
 * - business/: 业务组件（读取频道与客户端状态）
 */

// ==================== 基础组件 ====================
export * from './base';

// ==================== 业务组件 ====================
export * from './business/Channel';
