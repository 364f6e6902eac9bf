export type LanguageId = string;

export type MessageCode = string;

/**
 * What a handler hands back: either bare data, or data plus the arguments
 * substituted into the message template. Only `data` reaches the envelope.
 */
export type ResponsePayload<T = unknown> =
  | { kind: "plain"; data: T }
  | { kind: "withParams"; params: readonly string[]; data: T };

export interface RequestSignals {
  lang?: string;
  userAgent?: string;
  debug?: string;
  traceId?: string;
}

export interface EnvelopeTrace {
  id: string;
  desc: string;
}

export interface Envelope<T = unknown> {
  code: number;
  msg: string;
  trace: EnvelopeTrace;
  data: T;
}
