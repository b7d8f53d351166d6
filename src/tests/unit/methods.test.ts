import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { fileMethod } from '../../core/method.js';
import { encodeJson } from '../../core/encoding.js';
import { fileId, fileNameOf, fileUrl, uploadBytes, uploadPath } from '../../core/inputFile.js';
import { getMe, setMyCommands } from '../../core/methods/bot.js';
import { getUpdates } from '../../core/methods/updates.js';
import { replyText, sendMessage, messageText } from '../../core/methods/message.js';
import { sendDocument, sendMediaGroup, sendPhoto } from '../../core/methods/media.js';
import { setWebhook } from '../../core/methods/webhook.js';
import {
  banChatMember,
  deleteChatStickerSet,
  setChatPhoto,
  setChatStickerSet,
  unpinChatMessage,
} from '../../core/methods/chat.js';
import { answerInlineQuery } from '../../core/methods/query.js';
import type { InlineQueryResult } from '../../core/types/inline.js';
import { messageSchema } from '../../core/types/message.js';
import { textMessage } from '../helpers/FakeTransport.js';

const photoBytes = new Uint8Array([1, 2, 3]);

describe('plain requests', () => {
  it('should build getMe as a parameterless JSON request', () => {
    const method = getMe();

    expect(method.kind).toBe('json');
    expect(method.name).toBe('getMe');
    expect(method.params).toEqual({});
    expect(encodeJson(method)).toBe('{}');
  });

  it('should leave unset fields out of the params', () => {
    const method = sendMessage({ chat_id: 5, text: 'hi', parse_mode: undefined });

    expect(method.params).toEqual({ chat_id: 5, text: 'hi' });
    expect('parse_mode' in method.params).toBe(false);
    expect(encodeJson(method)).toBe('{"chat_id":5,"text":"hi"}');
  });

  it('should encode getUpdates with only the given fields', () => {
    expect(encodeJson(getUpdates({ offset: 10, timeout: 1 }))).toBe('{"offset":10,"timeout":1}');
  });

  it('should be frozen and detached from the caller-owned values', () => {
    const commands = [{ command: 'start', description: 'Start the bot' }];
    const method = setMyCommands(commands, { language_code: 'en' });
    commands.push({ command: 'help', description: 'Help' });

    expect(Object.isFrozen(method)).toBe(true);
    expect(Object.isFrozen(method.params)).toBe(true);
    expect(Object.isFrozen(method.params.commands)).toBe(true);
    expect(method.params.commands).toEqual([{ command: 'start', description: 'Start the bot' }]);
  });

  it('should target the chat and message being answered in replyText', () => {
    const message = messageSchema.parse(textMessage('ping'));
    const method = replyText(message, 'pong');

    expect(method.name).toBe('sendMessage');
    expect(method.params).toEqual({ chat_id: 42, text: 'pong', reply_to_message_id: 7 });
  });

  it('should return the text of a text message only from messageText', () => {
    const { text: _text, ...rest } = textMessage('ignored');
    const photoMessage = messageSchema.parse({
      ...rest,
      photo: [{ file_id: 'p', file_unique_id: 'u', width: 1, height: 1 }],
    });

    expect(messageText(messageSchema.parse(textMessage('ping')))).toBe('ping');
    expect(messageText(photoMessage)).toBeUndefined();
  });

  it('should map chat method arguments to wire fields', () => {
    expect(banChatMember('@channel', 99, { revoke_messages: true }).params).toEqual({
      chat_id: '@channel',
      user_id: 99,
      revoke_messages: true,
    });
    expect(unpinChatMessage(5).params).toEqual({ chat_id: 5 });
  });

  it('should name the sticker set fields of a supergroup', () => {
    const set = setChatStickerSet(-100200, 'party_animals');
    const remove = deleteChatStickerSet(-100200);

    expect(set.name).toBe('setChatStickerSet');
    expect(encodeJson(set)).toBe('{"chat_id":-100200,"sticker_set_name":"party_animals"}');
    expect(remove.name).toBe('deleteChatStickerSet');
    expect(encodeJson(remove)).toBe('{"chat_id":-100200}');
  });
});

describe('file-bearing requests', () => {
  it('should keep file fields out of the params and in files()', () => {
    const method = sendPhoto({ chat_id: 1, photo: uploadBytes('a.jpg', photoBytes, 'image/jpeg'), caption: 'c' });

    expect(method.kind).toBe('file');
    expect(method.name).toBe('sendPhoto');
    expect(method.params).toEqual({ chat_id: 1, caption: 'c' });
    expect([...method.files().keys()]).toEqual(['photo']);
    expect(method.files().get('photo')).toEqual({
      type: 'upload',
      file: { name: 'a.jpg', mime: 'image/jpeg', source: { kind: 'bytes', data: photoBytes } },
    });
  });

  it('should return a fresh map on every files() call', () => {
    const method = sendPhoto({ chat_id: 1, photo: fileId('AgAD') });

    expect(method.files()).not.toBe(method.files());
    expect(method.files()).toEqual(method.files());
  });

  it('should omit unset optional file fields', () => {
    const method = sendDocument({ chat_id: 1, document: fileUrl('https://example.com/report.pdf') });

    expect([...method.files().keys()]).toEqual(['document']);
  });

  it('should build setWebhook without files when no certificate is given', () => {
    const method = setWebhook({ url: 'https://example.com/webhook/telegram', drop_pending_updates: true });

    expect(method.kind).toBe('file');
    expect(method.files().size).toBe(0);
    expect(method.params).toEqual({ url: 'https://example.com/webhook/telegram', drop_pending_updates: true });
  });

  it('should carry the setChatPhoto photo as its only file', () => {
    const method = setChatPhoto(-100123, uploadBytes('logo.png', photoBytes, 'image/png'));

    expect(method.params).toEqual({ chat_id: -100123 });
    expect([...method.files().keys()]).toEqual(['photo']);
  });

  it('should reference sendMediaGroup uploads through attach:// names', () => {
    const method = sendMediaGroup({
      chat_id: 1,
      media: [
        { type: 'photo', media: fileId('existing') },
        { type: 'photo', media: uploadBytes('new.jpg', photoBytes, 'image/jpeg'), caption: 'fresh' },
      ],
    });

    expect(method.params.media).toEqual([
      { type: 'photo', media: 'existing' },
      { type: 'photo', media: 'attach://media1', caption: 'fresh' },
    ]);
    expect([...method.files().keys()]).toEqual(['media1']);
  });

  it('should reject a field that is both scalar and file', () => {
    expect(() => fileMethod('sendPhoto', { photo: 'x' }, { photo: fileId('y') }, z.boolean())).toThrow(TypeError);
  });
});

describe('inline query answers', () => {
  it('should encode each result with its type tag and content', () => {
    const results: InlineQueryResult[] = [
      {
        type: 'article',
        id: 'a1',
        title: 'Greeting',
        input_message_content: { message_text: '*hi*', parse_mode: 'MarkdownV2' },
      },
      { type: 'photo', id: 'p1', photo_file_id: 'AgADcached', caption: 'cat' },
      { type: 'location', id: 'l1', latitude: 52.5, longitude: 13.4, title: 'Here' },
    ];

    const method = answerInlineQuery({ inline_query_id: 'iq-1', results, cache_time: 0, is_personal: true });

    expect(method.kind).toBe('json');
    expect(method.name).toBe('answerInlineQuery');
    expect(encodeJson(method)).toBe(
      '{"inline_query_id":"iq-1","results":[' +
        '{"type":"article","id":"a1","title":"Greeting","input_message_content":{"message_text":"*hi*","parse_mode":"MarkdownV2"}},' +
        '{"type":"photo","id":"p1","photo_file_id":"AgADcached","caption":"cat"},' +
        '{"type":"location","id":"l1","latitude":52.5,"longitude":13.4,"title":"Here"}' +
        '],"cache_time":0,"is_personal":true}'
    );
  });

  it('should leave out the paging fields when they are unset', () => {
    const method = answerInlineQuery({ inline_query_id: 'iq-2', results: [], next_offset: undefined });

    expect(method.params).toEqual({ inline_query_id: 'iq-2', results: [] });
  });
});

describe('upload names', () => {
  it('should take the last segment of POSIX and Windows paths', () => {
    expect(fileNameOf('/tmp/uploads/cat.jpg')).toBe('cat.jpg');
    expect(fileNameOf('C:\\Users\\ann\\report.pdf')).toBe('report.pdf');
    expect(fileNameOf('relative/dir/')).toBe('dir');
    expect(fileNameOf('plain.txt')).toBe('plain.txt');
  });

  it('should default the upload name to the file name of the path', () => {
    const variant = uploadPath('/srv/files/photo.png', { mime: 'image/png' });

    expect(variant).toEqual({
      type: 'upload',
      file: { name: 'photo.png', mime: 'image/png', source: { kind: 'path', path: '/srv/files/photo.png' } },
    });
  });
});
