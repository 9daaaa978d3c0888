import { encodeAbiParameters, keccak256, parseAbiParameters, type Hex } from 'viem';
import type { InboundDelivery } from '@crossvote/shared';
import { normalizeId, toBytes32 } from '../lib/hex.js';

// ─── Interfaces ──────────────────────────────────────────

/**
 * Asynchronous, at-least-once message bus between chains. Accepting a
 * message says nothing about whether or when it is delivered.
 */
export interface MessageTransport {
  send(destination: number, recipient: Hex, payload: Hex): Promise<{ messageId: Hex }>;
}

export type InboundHandler = (delivery: InboundDelivery) => Promise<unknown>;

/** Identity of the node a transport is built for. `gateway` is bytes32. */
export interface TransportEndpoint {
  domain: number;
  gateway: Hex;
}

export type TransportFactory = (self: TransportEndpoint, inbound: InboundHandler) => MessageTransport;

const MESSAGE_ID_PARAMS = parseAbiParameters(
  'uint32 origin, uint32 destination, uint64 sequence, bytes32 sender, bytes32 recipient, bytes payload',
);

export function computeMessageId(params: {
  origin: number;
  destination: number;
  sequence: bigint;
  sender: Hex;
  recipient: Hex;
  payload: Hex;
}): Hex {
  return keccak256(
    encodeAbiParameters(MESSAGE_ID_PARAMS, [
      params.origin,
      params.destination,
      params.sequence,
      toBytes32(params.sender),
      toBytes32(params.recipient),
      params.payload,
    ]),
  );
}

// ─── Loopback Hub ────────────────────────────────────────

export interface QueuedMessage {
  messageId: Hex;
  origin: number;
  sender: Hex;
  destination: number;
  recipient: Hex;
  payload: Hex;
}

/**
 * In-process transport joining several nodes. Sends are queued, never
 * delivered on their own; the owner decides when, in which order and how
 * often each message arrives.
 */
export interface LoopbackHub {
  factory: TransportFactory;
  pending(): QueuedMessage[];
  /** Delivers the oldest queued message. Resolves to undefined when the queue is empty. */
  deliverNext(): Promise<unknown>;
  /** Drains the queue, including messages enqueued by deliveries along the way. */
  deliverAll(): Promise<unknown[]>;
  deliver(messageId: Hex): Promise<unknown>;
  /** Delivers an already delivered message again. */
  redeliver(messageId: Hex): Promise<unknown>;
  /** Drops a queued message without delivering it. */
  drop(messageId: Hex): QueuedMessage;
  /** Makes the next send reject with the given reason. */
  failNextSend(reason: string): void;
  /** Removes a domain's endpoint so a restarted node can connect again. Queued messages stay queued. */
  disconnect(domain: number): void;
}

export function createLoopbackHub(): LoopbackHub {
  const endpoints = new Map<number, { gateway: Hex; inbound: InboundHandler }>();
  const queue: QueuedMessage[] = [];
  const delivered = new Map<Hex, QueuedMessage>();
  let sequence = 0n;
  let nextFailure: string | null = null;

  function take(messageId: Hex): QueuedMessage {
    const id = normalizeId(messageId);
    const index = queue.findIndex((m) => m.messageId === id);
    if (index === -1) throw new Error(`[loopback] no queued message ${id}`);
    const [message] = queue.splice(index, 1);
    if (!message) throw new Error(`[loopback] no queued message ${id}`);
    return message;
  }

  async function hand(message: QueuedMessage): Promise<unknown> {
    const endpoint = endpoints.get(message.destination);
    if (!endpoint) throw new Error(`[loopback] domain ${message.destination} disconnected`);
    delivered.set(message.messageId, message);
    return endpoint.inbound({
      origin: message.origin,
      sender: message.sender,
      payload: message.payload,
      messageId: message.messageId,
    });
  }

  const factory: TransportFactory = (self, inbound) => {
    if (endpoints.has(self.domain)) {
      throw new Error(`[loopback] domain ${self.domain} is already connected`);
    }
    const sender = toBytes32(self.gateway);
    endpoints.set(self.domain, { gateway: sender, inbound });

    return {
      async send(destination, recipient, payload) {
        if (nextFailure !== null) {
          const reason = nextFailure;
          nextFailure = null;
          throw new Error(reason);
        }
        const endpoint = endpoints.get(destination);
        if (!endpoint) throw new Error(`no route to domain ${destination}`);
        const target = toBytes32(recipient);
        if (target !== endpoint.gateway) {
          throw new Error(`domain ${destination} has no gateway at ${target}`);
        }

        sequence += 1n;
        const messageId = computeMessageId({
          origin: self.domain,
          destination,
          sequence,
          sender,
          recipient: target,
          payload,
        });
        queue.push({ messageId, origin: self.domain, sender, destination, recipient: target, payload });
        return { messageId };
      },
    };
  };

  return {
    factory,
    pending: () => [...queue],

    async deliverNext() {
      const message = queue.shift();
      return message ? hand(message) : undefined;
    },

    async deliverAll() {
      const results: unknown[] = [];
      for (let message = queue.shift(); message; message = queue.shift()) {
        results.push(await hand(message));
      }
      return results;
    },

    deliver: (messageId) => hand(take(messageId)),

    async redeliver(messageId) {
      const message = delivered.get(normalizeId(messageId));
      if (!message) throw new Error(`[loopback] message ${messageId} was never delivered`);
      return hand(message);
    },

    drop: (messageId) => take(messageId),

    failNextSend(reason) {
      nextFailure = reason;
    },

    disconnect(domain) {
      if (!endpoints.delete(domain)) throw new Error(`[loopback] domain ${domain} is not connected`);
    },
  };
}

// ─── HTTP Transport ──────────────────────────────────────

export interface HttpTransportOptions {
  /** Base URL of the node serving each destination domain. */
  peers: Readonly<Record<number, string>>;
  timeoutMs?: number;
}

/**
 * Hands messages to peer nodes by POSTing them to their inbound route.
 * Inbound deliveries arrive through that same route, so the handler is
 * not used here.
 */
export function createHttpTransport(options: HttpTransportOptions): TransportFactory {
  const timeoutMs = options.timeoutMs ?? 10_000;

  return (self) => {
    const sender = toBytes32(self.gateway);
    let sequence = 0n;

    return {
      async send(destination, recipient, payload) {
        const peer = options.peers[destination];
        if (!peer) throw new Error(`no peer URL for domain ${destination}`);

        sequence += 1n;
        const messageId = computeMessageId({
          origin: self.domain,
          destination,
          sequence: BigInt(Date.now()) * 1_000n + sequence,
          sender,
          recipient,
          payload,
        });
        const delivery: InboundDelivery = { origin: self.domain, sender, payload, messageId };

        const res = await fetch(`${peer.replace(/\/$/, '')}/api/crosschain/inbound`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(delivery),
          signal: AbortSignal.timeout(timeoutMs),
        });
        if (!res.ok) {
          throw new Error(`peer ${destination} answered HTTP ${res.status}`);
        }
        return { messageId };
      },
    };
  };
}
