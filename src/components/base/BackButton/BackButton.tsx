/**
 * BackButton - 返回按钮
 *
 * 未传 onPressed 时回退浏览器历史。
 * showUnreads 且有未读时在按钮上显示角标（超过 99 显示 99+）。
 */

import React from 'react';
import { useTranslation } from 'react-i18next';
import './BackButton.css';

export interface BackButtonProps {
  onPressed?: () => void;
  showUnreads?: boolean;
  unreadCount?: number;
  color?: string;
}

export const MAX_UNREAD_BADGE = 99;

export const formatUnreadBadge = (count: number): string =>
  count > MAX_UNREAD_BADGE ? `${MAX_UNREAD_BADGE}+` : String(count);

export const BackButton: React.FC<BackButtonProps> = ({
  onPressed,
  showUnreads = false,
  unreadCount = 0,
  color,
}) => {
  const { t } = useTranslation();

  const handleClick = () => {
    if (onPressed) {
      onPressed();
      return;
    }
    window.history.back();
  };

  return (
    <button
      type="button"
      className="back-button"
      onClick={handleClick}
      aria-label={t('channelHeader.back')}
      style={{ color }}
    >
      <svg className="back-button__icon" viewBox="0 0 24 24" width={24} height={24} aria-hidden>
        <path d="M15 18l-6-6 6-6" fill="none" stroke="currentColor" strokeWidth={2} />
      </svg>
      {showUnreads && unreadCount > 0 && (
        <span
          className="back-button__badge"
          data-testid="unread-badge"
          aria-label={t('channelHeader.unread', { count: unreadCount })}
        >
          {formatUnreadBadge(unreadCount)}
        </span>
      )}
    </button>
  );
};

BackButton.displayName = 'BackButton';
