import React from 'react';
import { describe, expect, test } from '@jest/globals';
import { screen } from '@testing-library/react';
import { ChannelAvatar } from '../ChannelAvatar';
import { createChannelStore } from '../../../../stores/channelStore';
import type { ChannelMember } from '../../../../types/channel';
import { renderWithI18n } from '../../../../../test/jest/renderWithI18n';
import { alice, CURRENT_USER_ID, me } from '../../../../../test/jest/fixtures';

describe('ChannelAvatar', () => {
  test('优先使用频道图片', () => {
    const channel = createChannelStore({ id: 'c1', type: 'messaging', image: 'https://example.com/c1.png' });
    renderWithI18n(<ChannelAvatar channel={channel} />);
    expect(screen.getByRole('img').getAttribute('src')).toBe('https://example.com/c1.png');
  });

  test('私聊使用对方头像', () => {
    const peer: ChannelMember = { ...alice, user: { ...alice.user, image: 'https://example.com/alice.png' } };
    const channel = createChannelStore({ id: 'dm', type: 'messaging', isDistinct: true, members: [me, peer] });
    renderWithI18n(<ChannelAvatar channel={channel} currentUserId={CURRENT_USER_ID} />);
    expect(screen.getByRole('img').getAttribute('src')).toBe('https://example.com/alice.png');
  });

  test('没有图片时显示频道名首字母', () => {
    const channel = createChannelStore({ id: 'c1', type: 'messaging', name: 'product design' });
    renderWithI18n(<ChannelAvatar channel={channel} />);
    expect(screen.getByTestId('avatar').textContent).toBe('PD');
  });
});
