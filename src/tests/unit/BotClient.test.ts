import { describe, it, expect } from 'vitest';
import { BotClient } from '../../core/client/BotClient.js';
import { getMe } from '../../core/methods/bot.js';
import { setWebhook } from '../../core/methods/webhook.js';
import { TelegramApiError } from '../../utils/errors.js';
import { FakeTransport, botUser } from '../helpers/FakeTransport.js';

describe('BotClient', () => {
  it('should route plain requests through the JSON operation', async () => {
    const transport = new FakeTransport([{ ok: true, result: botUser }]);
    const client = new BotClient(transport);

    const me = await client.send(getMe());

    expect(me).toEqual(botUser);
    expect(transport.sent).toEqual([{ kind: 'json', name: 'getMe', params: {} }]);
  });

  it('should route file-bearing requests through the file operation', async () => {
    const transport = new FakeTransport([{ ok: true, result: true }]);
    const client = new BotClient(transport);

    await expect(client.send(setWebhook({ url: 'https://example.com/hook' }))).resolves.toBe(true);
    expect(transport.sent).toEqual([{ kind: 'file', name: 'setWebhook', params: { url: 'https://example.com/hook' } }]);
  });

  it('should pass transport failures through unchanged', async () => {
    const transport = new FakeTransport([{ ok: false, error_code: 401, description: 'Unauthorized' }]);
    const client = new BotClient(transport);

    await expect(client.send(getMe())).rejects.toMatchObject({
      name: 'TelegramApiError',
      description: 'Unauthorized',
    });
  });

  it('should send each request exactly once', async () => {
    const transport = new FakeTransport([{ ok: false, description: 'Too Many Requests', parameters: { retry_after: 1 } }]);
    const client = new BotClient(transport);

    await expect(client.send(getMe())).rejects.toBeInstanceOf(TelegramApiError);
    expect(transport.sent).toHaveLength(1);
  });
});
