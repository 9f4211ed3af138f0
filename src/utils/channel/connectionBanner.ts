import type { ConnectionStatus } from '../../types/channel';

export type ConnectionLabelKey =
  | 'connection.connected'
  | 'connection.reconnecting'
  | 'connection.disconnected';

export interface ConnectionBanner {
  /** i18n 文案 key */
  labelKey: ConnectionLabelKey;
  /** 该状态本身是否需要展示横幅 */
  showStatus: boolean;
}

/**
 * 连接状态 → 横幅文案与可见性
 *
 * connected 也会给出文案，但横幅保持隐藏（成功态不常驻）。
 */
export function resolveConnectionBanner(status: ConnectionStatus): ConnectionBanner {
  switch (status) {
    case 'connected':
      return { labelKey: 'connection.connected', showStatus: false };
    case 'connecting':
      return { labelKey: 'connection.reconnecting', showStatus: true };
    case 'disconnected':
      return { labelKey: 'connection.disconnected', showStatus: true };
    default:
      return assertNever(status);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unknown connection status: ${String(value)}`);
}
