/**
 * 测试数据
 */

import type { ChannelMember } from '../../src/types/channel';

export const CURRENT_USER_ID = 'u-me';

export const member = (
  id: string,
  name: string | undefined,
  online = false,
  lastActive?: Date
): ChannelMember => ({
  user: { id, name },
  online,
  lastActive,
});

export const me = member(CURRENT_USER_ID, 'Me', true);
export const alice = member('u-alice', 'Alice', true);
export const bob = member('u-bob', 'Bob', false);
export const carol = member('u-carol', 'Carol', false);
