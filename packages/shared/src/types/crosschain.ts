import type { Hex } from './governance.js';

// ─── Cross-Chain Types ───────────────────────────────────

/** Closed set of intents carried between chains. */
export type MessageKind = 'CREATE_PROPOSAL' | 'VOTE' | 'FINALIZE';

/**
 * A payload handed over by the transport on the receiving chain.
 * `sender` is the origin gateway as a left-padded bytes32.
 */
export interface InboundDelivery {
  origin: number;
  sender: Hex;
  payload: Hex;
  messageId?: Hex;
}

/** Returned to a caller once the transport accepted an outbound message. */
export interface DispatchReceipt {
  kind: MessageKind;
  destination: number;
  recipient: Hex;
  messageId: Hex;
  nonce?: string;
}

/** Outcome of an inbound delivery on the receiving chain. */
export interface InboundResult {
  kind: MessageKind;
  proposalId: Hex;
  duplicate: boolean;
}
