/**
 * Boundary with the chat platform. The adapter that speaks the wire
 * protocol implements ChatTransport and forwards inbound events to the app.
 */

export interface InlineButton {
  label: string;
  data: string;
}

/** Rows of buttons */
export type ButtonLayout = InlineButton[][];

export interface SendOptions {
  buttons?: ButtonLayout;
}

export interface SentMessage {
  id: number;
}

export interface TransferProgress {
  receivedBytes: number;
  totalBytes: number;
}

export interface DownloadOptions {
  /** Awaited by the transport after every chunk; a rejection stops the transfer */
  onProgress: (progress: TransferProgress) => Promise<void>;
  signal: AbortSignal;
}

export interface ChatTransport {
  download(transferId: number, destinationPath: string, options: DownloadOptions): Promise<void>;
  sendMessage(chatId: number, text: string, options?: SendOptions): Promise<SentMessage>;
  editMessage(chatId: number, messageId: number, text: string, options?: SendOptions): Promise<void>;
  deleteMessage(chatId: number, messageId: number): Promise<void>;
}

export interface InboundFileEvent {
  transferId: number;
  chatId: number;
  requesterId: number;
  filename: string;
  size: number;
}

export interface InboundTextEvent {
  chatId: number;
  userId: number;
  text: string;
}

export interface InboundCallbackEvent {
  chatId: number;
  userId: number;
  messageId: number;
  data: string;
}

/**
 * What a handler answers with; the controller decides whether it is sent
 * as a new message or replaces the one that carried the button
 */
export interface Reply {
  text: string;
  buttons?: ButtonLayout;
}
