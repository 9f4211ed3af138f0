import { useEffect, useMemo, useState } from 'react';
import { useTranslation } from 'react-i18next';

export type RelativeTime =
  | { kind: 'label'; key: 'time.justNow' | 'time.yesterday' }
  | { kind: 'count'; key: 'time.minutesAgo' | 'time.hoursAgo' | 'time.daysAgo'; count: number }
  | { kind: 'date'; date: Date };

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;

/**
 * 计算相对时间描述（不含文案，文案交给 i18n）
 *
 * 一小时内按分钟，一天内按小时，两天内为“昨天”，一周内按天，更早返回日期本身。
 */
export function getRelativeTime(date: Date, now: Date = new Date()): RelativeTime {
  const diffInMs = Math.max(0, now.getTime() - date.getTime());

  if (diffInMs < MINUTE) {
    return { kind: 'label', key: 'time.justNow' };
  }
  if (diffInMs < HOUR) {
    return { kind: 'count', key: 'time.minutesAgo', count: Math.floor(diffInMs / MINUTE) };
  }
  if (diffInMs < 24 * HOUR) {
    return { kind: 'count', key: 'time.hoursAgo', count: Math.floor(diffInMs / HOUR) };
  }
  if (diffInMs < 48 * HOUR) {
    return { kind: 'label', key: 'time.yesterday' };
  }
  if (diffInMs < 168 * HOUR) {
    return { kind: 'count', key: 'time.daysAgo', count: Math.floor(diffInMs / (24 * HOUR)) };
  }
  return { kind: 'date', date };
}

/**
 * 相对时间 Hook
 *
 * 未传 now 时按当前时间计算，并每分钟刷新一次。
 *
 * @example
 * ```tsx
 * const lastSeen = useRelativeTime(member.lastActive);
 * // "5 minutes ago" / "5分钟前"
 * ```
 */
export function useRelativeTime(date: Date | undefined, now?: Date): string | null {
  const { t, i18n } = useTranslation();
  const timestamp = date?.getTime();
  const nowTimestamp = now?.getTime();
  const [tick, setTick] = useState(0);
  const isLive = timestamp !== undefined && nowTimestamp === undefined;

  useEffect(() => {
    if (!isLive) {
      return undefined;
    }
    const timer = setInterval(() => setTick((value) => value + 1), MINUTE);
    return () => clearInterval(timer);
  }, [isLive]);

  // tick 只用来触发重新计算
  return useMemo(() => {
    if (timestamp === undefined) {
      return null;
    }

    const relative = getRelativeTime(
      new Date(timestamp),
      nowTimestamp === undefined ? new Date() : new Date(nowTimestamp)
    );

    if (relative.kind === 'label') {
      return t(relative.key);
    }
    if (relative.kind === 'count') {
      return t(relative.key, { count: relative.count });
    }
    return relative.date.toLocaleDateString(i18n.language, { month: 'short', day: 'numeric' });
  }, [timestamp, nowTimestamp, tick, t, i18n.language]);
}
