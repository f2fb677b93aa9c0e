/**
 * Tests for navigate action (src/actions/navigate.ts).
 */

import { describe, expect, it } from 'vitest';
import { executeNavigate, toNavigableUrl } from '../../src/actions/navigate.js';
import { NavigationError, ValidationError } from '../../src/utils/errors.js';
import { messages, setup } from '../helpers/fake-page.js';

describe('toNavigableUrl', () => {
  it('should prefix a dotted host with https', () => {
    expect(toNavigableUrl('example.com')).toBe('https://example.com/');
  });

  it('should keep an explicit scheme', () => {
    expect(toNavigableUrl('http://localhost:3000/login')).toBe('http://localhost:3000/login');
  });

  it('should treat a path with a slash as a URL', () => {
    expect(toNavigableUrl('shop.test/cart')).toBe('https://shop.test/cart');
  });

  it('should reject a bare section name with a hint to click instead', () => {
    expect(() => toNavigableUrl('Products')).toThrow(ValidationError);
    expect(() => toNavigableUrl('Products')).toThrow(
      "'Products' doesn't look like a URL. Did you mean to click on a 'Products' link instead?",
    );
  });

  it('should reject a URL-like target that does not parse', () => {
    expect(() => toNavigableUrl('my shop.test')).toThrow('Invalid URL: https://my shop.test');
  });
});

describe('executeNavigate', () => {
  it('should navigate, wait for network idle and settle', async () => {
    const { session, page, lines } = setup();

    await executeNavigate(session, 'example.com');

    expect(page.goto).toHaveBeenCalledTimes(1);
    expect(page.goto).toHaveBeenCalledWith('https://example.com/', {
      waitUntil: 'networkidle',
      timeout: 30000,
    });
    expect(page.waitForTimeout.mock.calls).toEqual([[1000]]);
    expect(messages(lines)).toContain('Successfully navigated to: https://example.com/');
  });

  it('should not touch the page for a target that is not URL-like', async () => {
    const { session, page } = setup();

    await expect(executeNavigate(session, 'Products')).rejects.toThrow(ValidationError);
    expect(page.goto).not.toHaveBeenCalled();
  });

  it('should retry with a two second pause and succeed on the third attempt', async () => {
    const { session, page, lines } = setup();
    page.goto
      .mockRejectedValueOnce(new Error('net::ERR_CONNECTION_RESET'))
      .mockRejectedValueOnce(new Error('Timeout 30000ms exceeded'));

    await executeNavigate(session, 'https://app.test');

    expect(page.goto).toHaveBeenCalledTimes(3);
    expect(page.waitForTimeout.mock.calls).toEqual([[2000], [2000], [1000]]);
    expect(messages(lines)).toContain('Navigation attempt 3/3 to: https://app.test/');
  });

  it('should give up after three failed attempts', async () => {
    const { session, page } = setup();
    page.goto.mockRejectedValue(new Error('net::ERR_NAME_NOT_RESOLVED'));

    await expect(executeNavigate(session, 'https://app.test')).rejects.toThrow(NavigationError);
    expect(page.goto).toHaveBeenCalledTimes(3);
    expect(page.waitForTimeout.mock.calls).toEqual([[2000], [2000]]);
  });
});
