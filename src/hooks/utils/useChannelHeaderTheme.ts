import { useMemo } from 'react';
import {
  resolveChannelHeaderTheme,
  type ChannelHeaderTheme,
  type ChannelHeaderThemeOverrides,
} from '../../constants/channelHeader';
import { useThemeStore } from '../../stores/themeStore';

/**
 * 根据当前明暗主题解析频道头部主题
 *
 * overrides 需要保持引用稳定（useMemo 或模块常量），否则每次渲染都会重新合并。
 */
export function useChannelHeaderTheme(
  overrides?: ChannelHeaderThemeOverrides
): ChannelHeaderTheme {
  const effectiveTheme = useThemeStore((state) => state.effectiveTheme);

  return useMemo(
    () => resolveChannelHeaderTheme(effectiveTheme, overrides),
    [effectiveTheme, overrides]
  );
}
