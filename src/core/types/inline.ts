import type { InlineKeyboardMarkup, MessageEntity, ParseMode } from './markup.js';

export interface LabeledPrice {
  label: string;
  /** In the smallest units of the currency. */
  amount: number;
}

export interface InputTextMessageContent {
  message_text: string;
  parse_mode?: ParseMode;
  entities?: MessageEntity[];
  disable_web_page_preview?: boolean;
}

export interface InputLocationMessageContent {
  latitude: number;
  longitude: number;
  horizontal_accuracy?: number;
  live_period?: number;
  heading?: number;
  proximity_alert_radius?: number;
}

export interface InputVenueMessageContent {
  latitude: number;
  longitude: number;
  title: string;
  address: string;
  foursquare_id?: string;
  foursquare_type?: string;
  google_place_id?: string;
  google_place_type?: string;
}

export interface InputContactMessageContent {
  phone_number: string;
  first_name: string;
  last_name?: string;
  vcard?: string;
}

export interface InputInvoiceMessageContent {
  title: string;
  description: string;
  payload: string;
  provider_token: string;
  currency: string;
  prices: LabeledPrice[];
  max_tip_amount?: number;
  suggested_tip_amounts?: number[];
  provider_data?: string;
  photo_url?: string;
  photo_size?: number;
  photo_width?: number;
  photo_height?: number;
  need_name?: boolean;
  need_phone_number?: boolean;
  need_email?: boolean;
  need_shipping_address?: boolean;
  send_phone_number_to_provider?: boolean;
  send_email_to_provider?: boolean;
  is_flexible?: boolean;
}

/** What is sent to the chat when a result is picked, in place of the result's own content. */
export type InputMessageContent =
  | InputTextMessageContent
  | InputLocationMessageContent
  | InputVenueMessageContent
  | InputContactMessageContent
  | InputInvoiceMessageContent;

interface ResultBase {
  /** Unique per answer, 1-64 bytes. */
  id: string;
  reply_markup?: InlineKeyboardMarkup;
}

interface Captioned {
  caption?: string;
  parse_mode?: ParseMode;
  caption_entities?: MessageEntity[];
  input_message_content?: InputMessageContent;
}

interface Thumbnailed {
  thumb_url?: string;
  thumb_width?: number;
  thumb_height?: number;
}

export interface InlineQueryResultArticle extends ResultBase, Thumbnailed {
  type: 'article';
  title: string;
  input_message_content: InputMessageContent;
  url?: string;
  hide_url?: boolean;
  description?: string;
}

export interface InlineQueryResultPhoto extends ResultBase, Captioned {
  type: 'photo';
  photo_url: string;
  thumb_url: string;
  photo_width?: number;
  photo_height?: number;
  title?: string;
  description?: string;
}

export interface InlineQueryResultGif extends ResultBase, Captioned {
  type: 'gif';
  gif_url: string;
  gif_width?: number;
  gif_height?: number;
  gif_duration?: number;
  thumb_url: string;
  thumb_mime_type?: string;
  title?: string;
}

export interface InlineQueryResultMpeg4Gif extends ResultBase, Captioned {
  type: 'mpeg4_gif';
  mpeg4_url: string;
  mpeg4_width?: number;
  mpeg4_height?: number;
  mpeg4_duration?: number;
  thumb_url: string;
  thumb_mime_type?: string;
  title?: string;
}

export interface InlineQueryResultVideo extends ResultBase, Captioned {
  type: 'video';
  video_url: string;
  mime_type: 'text/html' | 'video/mp4';
  thumb_url: string;
  title: string;
  video_width?: number;
  video_height?: number;
  video_duration?: number;
  description?: string;
}

export interface InlineQueryResultAudio extends ResultBase, Captioned {
  type: 'audio';
  audio_url: string;
  title: string;
  performer?: string;
  audio_duration?: number;
}

export interface InlineQueryResultVoice extends ResultBase, Captioned {
  type: 'voice';
  voice_url: string;
  title: string;
  voice_duration?: number;
}

export interface InlineQueryResultDocument extends ResultBase, Captioned, Thumbnailed {
  type: 'document';
  document_url: string;
  mime_type: 'application/pdf' | 'application/zip';
  title: string;
  description?: string;
}

export interface InlineQueryResultLocation extends ResultBase, Thumbnailed {
  type: 'location';
  latitude: number;
  longitude: number;
  title: string;
  horizontal_accuracy?: number;
  live_period?: number;
  heading?: number;
  proximity_alert_radius?: number;
  input_message_content?: InputMessageContent;
}

export interface InlineQueryResultVenue extends ResultBase, Thumbnailed {
  type: 'venue';
  latitude: number;
  longitude: number;
  title: string;
  address: string;
  foursquare_id?: string;
  foursquare_type?: string;
  google_place_id?: string;
  google_place_type?: string;
  input_message_content?: InputMessageContent;
}

export interface InlineQueryResultContact extends ResultBase, Thumbnailed {
  type: 'contact';
  phone_number: string;
  first_name: string;
  last_name?: string;
  vcard?: string;
  input_message_content?: InputMessageContent;
}

export interface InlineQueryResultGame extends ResultBase {
  type: 'game';
  game_short_name: string;
}

// Cached variants point at files already on Telegram's servers and share
// their `type` with the URL-based ones.

export interface InlineQueryResultCachedPhoto extends ResultBase, Captioned {
  type: 'photo';
  photo_file_id: string;
  title?: string;
  description?: string;
}

export interface InlineQueryResultCachedGif extends ResultBase, Captioned {
  type: 'gif';
  gif_file_id: string;
  title?: string;
}

export interface InlineQueryResultCachedMpeg4Gif extends ResultBase, Captioned {
  type: 'mpeg4_gif';
  mpeg4_file_id: string;
  title?: string;
}

export interface InlineQueryResultCachedSticker extends ResultBase {
  type: 'sticker';
  sticker_file_id: string;
  input_message_content?: InputMessageContent;
}

export interface InlineQueryResultCachedVideo extends ResultBase, Captioned {
  type: 'video';
  video_file_id: string;
  title: string;
  description?: string;
}

export interface InlineQueryResultCachedAudio extends ResultBase, Captioned {
  type: 'audio';
  audio_file_id: string;
}

export interface InlineQueryResultCachedVoice extends ResultBase, Captioned {
  type: 'voice';
  voice_file_id: string;
  title: string;
}

export interface InlineQueryResultCachedDocument extends ResultBase, Captioned {
  type: 'document';
  document_file_id: string;
  title: string;
  description?: string;
}

export type InlineQueryResult =
  | InlineQueryResultArticle
  | InlineQueryResultPhoto
  | InlineQueryResultGif
  | InlineQueryResultMpeg4Gif
  | InlineQueryResultVideo
  | InlineQueryResultAudio
  | InlineQueryResultVoice
  | InlineQueryResultDocument
  | InlineQueryResultLocation
  | InlineQueryResultVenue
  | InlineQueryResultContact
  | InlineQueryResultGame
  | InlineQueryResultCachedPhoto
  | InlineQueryResultCachedGif
  | InlineQueryResultCachedMpeg4Gif
  | InlineQueryResultCachedSticker
  | InlineQueryResultCachedVideo
  | InlineQueryResultCachedAudio
  | InlineQueryResultCachedVoice
  | InlineQueryResultCachedDocument;

export type InlineQueryResultType = InlineQueryResult['type'];
