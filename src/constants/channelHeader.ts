/**
 * 频道头部配置与主题预设
 */

import type { CSSProperties } from 'react';
import type { ConnectionStatus } from '../types/channel';

// 标准工具栏高度，头部对外报告的固定高度
export const TOOLBAR_HEIGHT = 56;

export const CHANNEL_HEADER_DEFAULTS = Object.freeze({
  showBackButton: true,
  showTypingIndicator: true,
  showConnectionStateTile: false,
});

// 标题与副标题之间的间距
export const TITLE_SPACING = 2;

// 默认头像右侧留白
export const AVATAR_RIGHT_PADDING = 10;

export interface AvatarTheme {
  borderRadius?: number | string;
  constraints?: {
    width: number;
    height: number;
  };
}

export interface BannerTheme {
  /** 横幅背景色，按连接状态区分 */
  colors: Record<ConnectionStatus, string>;
  textColor: string;
}

export interface ChannelHeaderTheme {
  color: string;
  titleStyle: CSSProperties;
  subtitleStyle: CSSProperties;
  avatarTheme?: AvatarTheme;
  banner: BannerTheme;
}

export type ChannelHeaderThemeOverrides = Partial<Omit<ChannelHeaderTheme, 'banner'>> & {
  banner?: {
    colors?: Partial<BannerTheme['colors']>;
    textColor?: string;
  };
};

export const LIGHT_CHANNEL_HEADER_THEME: ChannelHeaderTheme = {
  color: '#ffffff',
  titleStyle: { fontSize: 16, fontWeight: 600, color: '#000000' },
  subtitleStyle: { fontSize: 12, color: '#7a7a7a' },
  avatarTheme: {
    borderRadius: 20,
    constraints: { width: 40, height: 40 },
  },
  banner: {
    colors: {
      connected: '#20e070',
      connecting: '#ffb300',
      disconnected: '#ff3742',
    },
    textColor: '#ffffff',
  },
};

export const DARK_CHANNEL_HEADER_THEME: ChannelHeaderTheme = {
  color: '#101418',
  titleStyle: { fontSize: 16, fontWeight: 600, color: '#ffffff' },
  subtitleStyle: { fontSize: 12, color: '#9aa0a6' },
  avatarTheme: {
    borderRadius: 20,
    constraints: { width: 40, height: 40 },
  },
  banner: {
    colors: {
      connected: '#1a9e55',
      connecting: '#c98a00',
      disconnected: '#c4262f',
    },
    textColor: '#ffffff',
  },
};

/**
 * 按明暗主题取预设，再叠加覆盖项
 */
export function resolveChannelHeaderTheme(
  effectiveTheme: 'light' | 'dark',
  overrides: ChannelHeaderThemeOverrides = {}
): ChannelHeaderTheme {
  const base = effectiveTheme === 'dark' ? DARK_CHANNEL_HEADER_THEME : LIGHT_CHANNEL_HEADER_THEME;
  const { banner, ...rest } = overrides;

  return {
    ...base,
    ...rest,
    titleStyle: { ...base.titleStyle, ...rest.titleStyle },
    subtitleStyle: { ...base.subtitleStyle, ...rest.subtitleStyle },
    banner: {
      colors: { ...base.banner.colors, ...banner?.colors },
      textColor: banner?.textColor ?? base.banner.textColor,
    },
  };
}
