import { describe, it, expect, vi } from 'vitest';
import { UpdateDispatcher, type KindHandler } from '../../core/updates/UpdateDispatcher.js';
import { updateSchema, updateType } from '../../core/types/update.js';
import { DecodeError } from '../../utils/errors.js';
import { textMessage } from '../helpers/FakeTransport.js';

const messageUpdate = updateSchema.parse({ update_id: 1, message: textMessage('hi') });
const callbackUpdate = updateSchema.parse({
  update_id: 2,
  callback_query: {
    id: 'cb-1',
    from: { id: 42, is_bot: false, first_name: 'Ann' },
    chat_instance: 'ci',
    data: 'yes',
  },
});

describe('updateType', () => {
  it('should name the kind an update carries', () => {
    expect(updateType(messageUpdate)).toBe('message');
    expect(updateType(callbackUpdate)).toBe('callback_query');
  });

  it('should return undefined for kinds that are not modelled', () => {
    expect(updateType(updateSchema.parse({ update_id: 3, message_reaction: {} }))).toBeUndefined();
  });
});

describe('UpdateDispatcher', () => {
  it('should hand each kind handler its payload and the whole update', async () => {
    const onMessage = vi.fn<KindHandler<'message'>>(async () => {});
    const onCallback = vi.fn<KindHandler<'callback_query'>>(async () => {});
    const dispatcher = new UpdateDispatcher().on('message', onMessage).on('callback_query', onCallback);

    await dispatcher.dispatch(messageUpdate);

    expect(onMessage).toHaveBeenCalledWith(messageUpdate.message, messageUpdate);
    expect(onCallback).not.toHaveBeenCalled();
  });

  it('should run every handler registered for a kind', async () => {
    const calls: string[] = [];
    const dispatcher = new UpdateDispatcher()
      .on('callback_query', async (query) => {
        calls.push(`first:${query.data}`);
      })
      .on('callback_query', async (query) => {
        calls.push(`second:${query.id}`);
      });

    await dispatcher.dispatch(callbackUpdate);

    expect(calls).toEqual(['first:yes', 'second:cb-1']);
  });

  it('should show catch-all handlers every update', async () => {
    const seen: number[] = [];
    const dispatcher = new UpdateDispatcher().onUpdate(async (update) => {
      seen.push(update.update_id);
    });

    await dispatcher.dispatch(messageUpdate);
    await dispatcher.dispatch(updateSchema.parse({ update_id: 9 }));

    expect(seen).toEqual([1, 9]);
  });

  it('should propagate handler failures', async () => {
    const dispatcher = new UpdateDispatcher().on('message', async () => {
      throw new Error('handler broke');
    });

    await expect(dispatcher.dispatch(messageUpdate)).rejects.toThrow('handler broke');
  });

  it('should decode untrusted bodies before dispatching them', async () => {
    const onMessage = vi.fn<KindHandler<'message'>>(async () => {});
    const dispatcher = new UpdateDispatcher().on('message', onMessage);

    await dispatcher.handle({ update_id: 1, message: textMessage('hi') });

    expect(onMessage).toHaveBeenCalledTimes(1);
    expect(onMessage).toHaveBeenCalledWith(messageUpdate.message, messageUpdate);
  });

  it('should reject bodies that are not updates', async () => {
    const dispatcher = new UpdateDispatcher();

    await expect(dispatcher.handle({ message: 'hi' })).rejects.toBeInstanceOf(DecodeError);
    await expect(dispatcher.handle('nope')).rejects.toThrow('Body is not a Telegram update');
  });
});
