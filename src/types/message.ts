/**
 * 一般 NATS 訊息（publish / subscribe 指令使用）
 */
export interface Message {
  id: string;
  subject: string;
  body: string;
  /** ISO 8601 */
  timestamp: string;
  metadata: Record<string, string>;
}
