import { describe, it, expect } from 'vitest';
import { buildFileUrl, buildMethodUrl } from '../../core/url.js';

describe('buildMethodUrl', () => {
  it('should place the token and method under the default host', () => {
    expect(buildMethodUrl('test-token', 'getMe')).toBe('https://api.telegram.org/bottest-token/getMe');
  });

  it('should use a self-hosted base URL', () => {
    expect(buildMethodUrl('test-token', 'sendMessage', 'http://localhost:8081')).toBe(
      'http://localhost:8081/bottest-token/sendMessage'
    );
  });
});

describe('buildFileUrl', () => {
  it('should point at the file download path', () => {
    expect(buildFileUrl('test-token', 'photos/file_0.jpg')).toBe(
      'https://api.telegram.org/file/bottest-token/photos/file_0.jpg'
    );
  });
});
