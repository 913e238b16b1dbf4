/** A message or reaction arriving from the chat surface. */
export type InboundMessage = {
  channelId: string;
  userId: string;
  text: string;
  /** Id of this message (Slack `ts`). For reactions, the id of the reacted message. */
  messageId: string;
  /** Parent thread when the message is a threaded reply. */
  threadId: string | null;
  /** Set for reaction events; `text` is empty then. */
  reaction?: string;
};

export type OutboundMessage = {
  channelId: string;
  text: string;
  threadId?: string;
};

/** Outbound port to the chat surface. Returns the new message's id when the surface reports one. */
export interface ChatSurface {
  send(msg: OutboundMessage): Promise<string | null>;
}
