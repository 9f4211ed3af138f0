import { useCallback, useSyncExternalStore } from 'react';
import type { Subscribable } from '../../types/channel';

/**
 * 订阅外部数据源并选取其中一部分
 *
 * 组件挂载期间保持订阅，卸载时自动取消。
 * selector 应返回原始值或 store 中已有的引用，避免每次渲染生成新对象。
 *
 * @example
 * ```tsx
 * const name = useSubscribable(channel, (state) => state.name);
 * ```
 */
export function useSubscribable<T, S>(
  source: Subscribable<T>,
  selector: (state: T) => S
): S {
  const subscribe = useCallback(
    (onStoreChange: () => void) => source.subscribe(onStoreChange),
    [source]
  );
  const getSnapshot = () => selector(source.getState());

  return useSyncExternalStore(subscribe, getSnapshot, getSnapshot);
}
