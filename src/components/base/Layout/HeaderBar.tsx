/**
 * HeaderBar - 基础头部栏组件
 *
 * 职责：提供 前导控件 / 标题 / 操作区 三段式插槽
 * 特点：
 * - 纯展示，不感知频道
 * - 标题居中
 * - 高度由调用方指定
 */

import React, { Children, ReactNode } from 'react';
import './HeaderBar.css';

export interface HeaderBarProps {
  /** 左侧控件 */
  leading?: ReactNode;
  /** 标题内容 */
  title: ReactNode;
  /** 右侧操作区，按顺序渲染 */
  actions?: ReactNode[];
  backgroundColor?: string;
  height: number;
  className?: string;
}

export const HeaderBar: React.FC<HeaderBarProps> = ({
  leading,
  title,
  actions = [],
  backgroundColor,
  height,
  className = '',
}) => {
  return (
    <header
      className={`header-bar ${className}`}
      style={{ height, backgroundColor }}
      data-testid="header-bar"
    >
      <div className="header-bar__leading">{leading}</div>
      <div className="header-bar__title">{title}</div>
      <div className="header-bar__actions">{Children.toArray(actions)}</div>
    </header>
  );
};

HeaderBar.displayName = 'HeaderBar';
