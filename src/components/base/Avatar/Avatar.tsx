/**
 * Avatar - 头像
 *
 * 有图片显示图片，否则显示名称首字母。
 * 传入 onTap 时才具备按钮语义。
 */

import React, { CSSProperties, KeyboardEvent } from 'react';
import type { AvatarTheme } from '../../../constants/channelHeader';
import { getInitials } from '../../../utils/channel/channelDisplay';
import './Avatar.css';

export interface AvatarProps extends AvatarTheme {
  image?: string;
  name: string;
  onTap?: () => void;
  /** 无障碍标签，默认使用 name */
  label?: string;
}

const DEFAULT_SIZE = 40;

export const Avatar: React.FC<AvatarProps> = ({
  image,
  name,
  onTap,
  label,
  borderRadius,
  constraints,
}) => {
  const style: CSSProperties = {
    width: constraints?.width ?? DEFAULT_SIZE,
    height: constraints?.height ?? DEFAULT_SIZE,
    borderRadius,
  };

  const handleKeyDown = (event: KeyboardEvent<HTMLDivElement>) => {
    if (onTap && (event.key === 'Enter' || event.key === ' ')) {
      event.preventDefault();
      onTap();
    }
  };

  const interactiveProps = onTap
    ? { role: 'button', tabIndex: 0, onClick: onTap, onKeyDown: handleKeyDown }
    : {};

  return (
    <div
      className="avatar"
      style={style}
      aria-label={label ?? name}
      data-testid="avatar"
      {...interactiveProps}
    >
      {image ? (
        <img className="avatar__image" src={image} alt={label ?? name} style={{ borderRadius }} />
      ) : (
        <span className="avatar__initials">{getInitials(name)}</span>
      )}
    </div>
  );
};

Avatar.displayName = 'Avatar';
