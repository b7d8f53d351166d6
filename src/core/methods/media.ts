import { z } from 'zod';
import { fileReference, type InputFileVariant } from '../inputFile.js';
import { fileMethod, type FileMethod } from '../method.js';
import type { ChatId } from '../types/chat.js';
import type { MessageEntity, ParseMode } from '../types/markup.js';
import { messageSchema, type Message } from '../types/message.js';
import type { SendOptions } from './message.js';

interface CaptionOptions {
  caption?: string;
  parse_mode?: ParseMode;
  caption_entities?: MessageEntity[];
}

export interface SendPhotoParams extends SendOptions, CaptionOptions {
  chat_id: ChatId;
  photo: InputFileVariant;
}

export function sendPhoto(params: SendPhotoParams): FileMethod<Message> {
  const { photo, ...rest } = params;
  return fileMethod('sendPhoto', rest, { photo }, messageSchema);
}

export interface SendDocumentParams extends SendOptions, CaptionOptions {
  chat_id: ChatId;
  document: InputFileVariant;
  thumb?: InputFileVariant;
  disable_content_type_detection?: boolean;
}

export function sendDocument(params: SendDocumentParams): FileMethod<Message> {
  const { document, thumb, ...rest } = params;
  return fileMethod('sendDocument', rest, { document, thumb }, messageSchema);
}

export interface SendAudioParams extends SendOptions, CaptionOptions {
  chat_id: ChatId;
  audio: InputFileVariant;
  duration?: number;
  performer?: string;
  title?: string;
  thumb?: InputFileVariant;
}

export function sendAudio(params: SendAudioParams): FileMethod<Message> {
  const { audio, thumb, ...rest } = params;
  return fileMethod('sendAudio', rest, { audio, thumb }, messageSchema);
}

export interface SendVideoParams extends SendOptions, CaptionOptions {
  chat_id: ChatId;
  video: InputFileVariant;
  duration?: number;
  width?: number;
  height?: number;
  thumb?: InputFileVariant;
  supports_streaming?: boolean;
}

export function sendVideo(params: SendVideoParams): FileMethod<Message> {
  const { video, thumb, ...rest } = params;
  return fileMethod('sendVideo', rest, { video, thumb }, messageSchema);
}

export interface SendAnimationParams extends SendOptions, CaptionOptions {
  chat_id: ChatId;
  animation: InputFileVariant;
  duration?: number;
  width?: number;
  height?: number;
  thumb?: InputFileVariant;
}

export function sendAnimation(params: SendAnimationParams): FileMethod<Message> {
  const { animation, thumb, ...rest } = params;
  return fileMethod('sendAnimation', rest, { animation, thumb }, messageSchema);
}

export interface SendVoiceParams extends SendOptions, CaptionOptions {
  chat_id: ChatId;
  voice: InputFileVariant;
  duration?: number;
}

export function sendVoice(params: SendVoiceParams): FileMethod<Message> {
  const { voice, ...rest } = params;
  return fileMethod('sendVoice', rest, { voice }, messageSchema);
}

export interface SendVideoNoteParams extends SendOptions {
  chat_id: ChatId;
  video_note: InputFileVariant;
  duration?: number;
  length?: number;
  thumb?: InputFileVariant;
}

export function sendVideoNote(params: SendVideoNoteParams): FileMethod<Message> {
  const { video_note, thumb, ...rest } = params;
  return fileMethod('sendVideoNote', rest, { video_note, thumb }, messageSchema);
}

export interface InputMedia extends CaptionOptions {
  type: 'photo' | 'video' | 'audio' | 'document';
  media: InputFileVariant;
  thumb?: InputFileVariant;
}

export interface SendMediaGroupParams {
  chat_id: ChatId;
  /** 2-10 items. */
  media: InputMedia[];
  disable_notification?: boolean;
  protect_content?: boolean;
  reply_to_message_id?: number;
  allow_sending_without_reply?: boolean;
}

/**
 * Uploads inside `media` travel as separate parts named `media<i>` / `thumb<i>`
 * and are referenced from the JSON array as `attach://<part name>`.
 */
export function sendMediaGroup(params: SendMediaGroupParams): FileMethod<Message[]> {
  const { media, ...rest } = params;
  const files: Record<string, InputFileVariant> = {};

  const attach = (variant: InputFileVariant, partName: string): string => {
    const reference = fileReference(variant);
    if (reference !== undefined) {
      return reference;
    }
    files[partName] = variant;
    return `attach://${partName}`;
  };

  const items = media.map(({ thumb, ...item }, index) => ({
    ...item,
    media: attach(item.media, `media${index}`),
    ...(thumb === undefined ? {} : { thumb: attach(thumb, `thumb${index}`) }),
  }));

  return fileMethod('sendMediaGroup', { ...rest, media: items }, files, z.array(messageSchema));
}
