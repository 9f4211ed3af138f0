/**
 * 组件测试工具：注入独立的 i18n 实例
 *
 * 以 wrapper 方式注入，rerender 时 Provider 保持不变。
 */

import React, { ReactElement, ReactNode } from 'react';
import { render, RenderResult } from '@testing-library/react';
import { I18nextProvider } from 'react-i18next';
import { createI18n, type SupportedLanguage } from '../../src/i18n/config';

export function renderWithI18n(ui: ReactElement, lng: SupportedLanguage = 'en'): RenderResult {
  const i18n = createI18n(lng);
  const Wrapper = ({ children }: { children: ReactNode }) => (
    <I18nextProvider i18n={i18n}>{children}</I18nextProvider>
  );
  return render(ui, { wrapper: Wrapper });
}
