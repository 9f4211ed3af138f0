import React from 'react';
import { describe, expect, jest, test } from '@jest/globals';
import { fireEvent, render, screen } from '@testing-library/react';
import { Avatar } from '../Avatar';

describe('Avatar', () => {
  test('有图片时渲染图片', () => {
    render(<Avatar image="https://example.com/a.png" name="Alice" />);
    const img = screen.getByRole('img');
    expect(img.getAttribute('src')).toBe('https://example.com/a.png');
    expect(img.getAttribute('alt')).toBe('Alice');
  });

  test('没有图片时显示首字母', () => {
    render(<Avatar name="Alice Cooper" />);
    expect(screen.getByTestId('avatar').textContent).toBe('AC');
  });

  test('按 constraints 与 borderRadius 设置尺寸', () => {
    render(<Avatar name="A" borderRadius={12} constraints={{ width: 32, height: 30 }} />);
    const avatar = screen.getByTestId('avatar');
    expect(avatar.style.width).toBe('32px');
    expect(avatar.style.height).toBe('30px');
    expect(avatar.style.borderRadius).toBe('12px');
  });

  test('默认尺寸 40', () => {
    render(<Avatar name="A" />);
    expect(screen.getByTestId('avatar').style.width).toBe('40px');
  });

  test('只有传入 onTap 时才是按钮', () => {
    const onTap = jest.fn();
    const { rerender } = render(<Avatar name="A" />);
    expect(screen.queryByRole('button')).toBeNull();

    rerender(<Avatar name="A" onTap={onTap} />);
    fireEvent.click(screen.getByRole('button'));
    fireEvent.keyDown(screen.getByRole('button'), { key: 'Enter' });
    expect(onTap).toHaveBeenCalledTimes(2);
  });
});
