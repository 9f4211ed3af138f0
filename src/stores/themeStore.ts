import { create } from 'zustand';
import { persist } from 'zustand/middleware';
import { createEventManager } from '../utils/events/eventManager';

export type Theme = 'light' | 'dark' | 'auto';

interface ThemeState {
  theme: Theme;
  effectiveTheme: 'light' | 'dark'; // 实际应用的主题
  setTheme: (theme: Theme) => void;
  updateEffectiveTheme: () => void;
}

const DARK_SCHEME_QUERY = '(prefers-color-scheme: dark)';

// jsdom 与 SSR 环境没有 matchMedia
const getColorSchemeQuery = (): MediaQueryList | null => {
  if (typeof window === 'undefined' || typeof window.matchMedia !== 'function') {
    return null;
  }
  return window.matchMedia(DARK_SCHEME_QUERY);
};

// 获取系统主题偏好
const getSystemTheme = (): 'light' | 'dark' => {
  return getColorSchemeQuery()?.matches ? 'dark' : 'light';
};

// 计算有效主题
export const calculateEffectiveTheme = (theme: Theme): 'light' | 'dark' => {
  if (theme === 'auto') {
    return getSystemTheme();
  }
  return theme;
};

export const useThemeStore = create<ThemeState>()(
  persist(
    (set, get) => ({
      theme: 'light',
      effectiveTheme: 'light',

      setTheme: (theme: Theme) => {
        const effectiveTheme = calculateEffectiveTheme(theme);
        set({ theme, effectiveTheme });
      },

      updateEffectiveTheme: () => {
        const effectiveTheme = calculateEffectiveTheme(get().theme);
        set({ effectiveTheme });
      },
    }),
    {
      name: 'theme-storage',
      partialize: (state) => ({ theme: state.theme }),
      onRehydrateStorage: () => (state) => {
        if (state) {
          // 恢复时重新计算
          state.updateEffectiveTheme();
        }
      },
    }
  )
);

// 监听系统主题变化，只影响 auto 模式
const themeEventManager = createEventManager();

const colorSchemeQuery = getColorSchemeQuery();
if (colorSchemeQuery) {
  themeEventManager.addEventListener(colorSchemeQuery, 'change', () => {
    const store = useThemeStore.getState();
    if (store.theme === 'auto') {
      store.updateEffectiveTheme();
    }
  });
}

// 导出事件管理器（用于测试或手动清理）
export { themeEventManager };
