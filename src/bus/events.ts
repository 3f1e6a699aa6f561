export type MessageKind = "room_message" | "direct_message";

/** Where a reply goes: rendered as `channel:kind:targetId`. */
export interface MessageAddress {
  channel: string;
  kind: MessageKind;
  targetId: string;
}

export interface InboundMessage {
  channel: string;
  senderId: string;
  chatId: string;
  kind: MessageKind;
  content: string;
  timestamp?: Date;
  metadata?: Record<string, unknown>;
}

export interface OutboundMessage {
  channel: string;
  chatId: string;
  kind: MessageKind;
  content: string;
  metadata?: Record<string, unknown>;
}

export function formatAddress(address: MessageAddress): string {
  return `${address.channel}:${address.kind}:${address.targetId}`;
}

export function replyAddress(msg: InboundMessage): MessageAddress {
  return { channel: msg.channel, kind: msg.kind, targetId: msg.chatId };
}
