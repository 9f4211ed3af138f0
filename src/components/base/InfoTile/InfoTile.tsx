/**
 * InfoTile - 状态横幅
 *
 * showMessage 为 true 时在子内容上方显示一条提示，否则只渲染子内容。
 */

import React, { ReactNode } from 'react';
import './InfoTile.css';

export interface InfoTileProps {
  showMessage: boolean;
  message: string;
  /** 横幅背景色 */
  backgroundColor?: string;
  textColor?: string;
  children: ReactNode;
}

export const InfoTile: React.FC<InfoTileProps> = ({
  showMessage,
  message,
  backgroundColor,
  textColor,
  children,
}) => {
  return (
    <div className="info-tile">
      {showMessage && (
        <div
          className="info-tile__message"
          role="status"
          style={{ backgroundColor, color: textColor }}
        >
          {message}
        </div>
      )}
      {children}
    </div>
  );
};

InfoTile.displayName = 'InfoTile';
