/**
 * Request/Reply Transport
 * 訊息層抽象 - 一次性請求/回覆與 queue group 訂閱
 */

export interface RequestOptions {
  /** 等待回覆的上限（毫秒），逾時必須以 TransportTimeoutError 拒絕並釋放狀態 */
  timeoutMs: number;
  /** 呼叫端放棄等待時中止，transport 需釋放為此請求建立的狀態 */
  signal?: AbortSignal;
}

/**
 * 訂閱處理函數：回傳值即為回覆內容
 */
export type ReplyHandler = (data: string, subject: string) => Promise<string>;

/**
 * 單向訊息處理函數（不回覆）
 */
export type MessageHandler = (data: string, subject: string) => Promise<void>;

export interface TransportSubscription {
  readonly subject: string;
  readonly queue?: string;
  unsubscribe(): void;
}

export interface RequestReplyTransport {
  request(subject: string, data: string, options: RequestOptions): Promise<string>;
  subscribe(subject: string, handler: ReplyHandler, options?: { queue?: string }): TransportSubscription;
  /** 單向發布，不等待回覆 */
  publish(subject: string, data: string): void;
  /** 接收單向訊息；設定 queue 時同一 group 只有一個成員收到 */
  listen(subject: string, handler: MessageHandler, options?: { queue?: string }): TransportSubscription;
  isClosed(): boolean;
  close(): Promise<void>;
}

export class TransportTimeoutError extends Error {
  readonly code = 'TRANSPORT_TIMEOUT';

  constructor(subject: string, timeoutMs: number) {
    super(`Request on ${subject} timed out after ${timeoutMs}ms`);
    this.name = 'TransportTimeoutError';
  }
}

export class NoRespondersError extends Error {
  readonly code = 'NO_RESPONDERS';

  constructor(subject: string) {
    super(`No responders available for ${subject}`);
    this.name = 'NoRespondersError';
  }
}

export class TransportClosedError extends Error {
  readonly code = 'TRANSPORT_CLOSED';

  constructor(message = 'Transport connection is closed') {
    super(message);
    this.name = 'TransportClosedError';
  }
}

export class RequestAbortedError extends Error {
  readonly code = 'REQUEST_ABORTED';

  constructor(subject: string) {
    super(`Request on ${subject} was aborted`);
    this.name = 'RequestAbortedError';
  }
}
