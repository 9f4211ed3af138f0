import i18next, { type i18n as I18nInstance } from 'i18next';
import { initReactI18next } from 'react-i18next';
import zh from './locales/zh.json';
import en from './locales/en.json';

export type SupportedLanguage = 'zh' | 'en';

const resources = {
  zh: { translation: zh },
  en: { translation: en },
};

// 获取已保存的语言或浏览器语言
export const getDefaultLanguage = (): SupportedLanguage => {
  if (typeof localStorage !== 'undefined') {
    const savedLanguage = localStorage.getItem('language');
    if (savedLanguage === 'zh' || savedLanguage === 'en') {
      return savedLanguage;
    }
  }

  if (typeof navigator === 'undefined') {
    return 'zh';
  }

  const browserLanguage = navigator.language.toLowerCase();
  if (browserLanguage.startsWith('zh')) {
    return 'zh';
  }
  return 'en';
};

/**
 * 创建独立的 i18n 实例
 *
 * 资源是内联的，初始化同步完成，渲染时无需 Suspense。
 * 宿主应用或测试可以用 I18nextProvider 注入。
 */
export function createI18n(lng: SupportedLanguage = getDefaultLanguage()): I18nInstance {
  const instance = i18next.createInstance();
  instance
    .use(initReactI18next)
    .init({
      resources,
      lng,
      fallbackLng: 'zh',
      initImmediate: false,
      interpolation: {
        escapeValue: false,
      },
      react: {
        useSuspense: false,
      },
    })
    .catch((error: unknown) => {
      console.error('❌ i18n 初始化失败:', error);
    });
  return instance;
}

const i18n = createI18n();

export default i18n;
