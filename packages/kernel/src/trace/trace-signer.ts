/**
 * Trace signing
 *
 * Each event is signed with Ed25519 over its canonical JSON (signature
 * removed) followed by the previous event's signature. The chain makes a
 * dropped, reordered or edited record fail verification.
 */

import {
  createPrivateKey,
  createPublicKey,
  generateKeyPairSync,
  sign,
  verify,
  type KeyObject,
} from 'crypto';
import { canonicalJson, type TraceEvent } from '@mesh-kernel/contracts';

export type UnsignedTraceEvent = Omit<TraceEvent, 'signature'>;

export interface TraceVerification {
  valid: boolean;
  failures: Array<{ seq: number; reason: string }>;
}

export function signingPayload(event: UnsignedTraceEvent | TraceEvent, previousSignature: string | undefined): Buffer {
  // canonicalJson drops undefined members
  const unsigned = { ...event, signature: undefined };
  return Buffer.from(`${canonicalJson(unsigned)}\n${previousSignature ?? ''}`, 'utf8');
}

export class TraceSigner {
  private constructor(
    private readonly privateKey: KeyObject,
    readonly publicKey: KeyObject
  ) {}

  static generate(): TraceSigner {
    const { privateKey, publicKey } = generateKeyPairSync('ed25519');
    return new TraceSigner(privateKey, publicKey);
  }

  /**
   * Load a PEM-encoded Ed25519 private key.
   */
  static fromPem(pem: string): TraceSigner {
    const privateKey = createPrivateKey(pem);
    if (privateKey.asymmetricKeyType !== 'ed25519') {
      throw new Error(`Trace signing key must be ed25519, got ${privateKey.asymmetricKeyType ?? 'unknown'}`);
    }
    return new TraceSigner(privateKey, createPublicKey(privateKey));
  }

  publicKeyPem(): string {
    return this.publicKey.export({ type: 'spki', format: 'pem' }).toString();
  }

  privateKeyPem(): string {
    return this.privateKey.export({ type: 'pkcs8', format: 'pem' }).toString();
  }

  sign(event: UnsignedTraceEvent, previousSignature: string | undefined): string {
    return sign(null, signingPayload(event, previousSignature), this.privateKey).toString('base64');
  }
}

/**
 * Check every signature in a log, the chain between them, and that `seq`
 * runs 1, 2, 3, ... for one plan.
 */
export function verifyTraceLog(events: readonly TraceEvent[], publicKey: KeyObject | string): TraceVerification {
  const key = typeof publicKey === 'string' ? createPublicKey(publicKey) : publicKey;
  const failures: TraceVerification['failures'] = [];
  let previous: string | undefined;
  const planId = events[0]?.plan_id;

  events.forEach((event, index) => {
    if (event.seq !== index + 1) {
      failures.push({ seq: event.seq, reason: `expected seq ${index + 1}` });
    }
    if (event.plan_id !== planId) {
      failures.push({ seq: event.seq, reason: `plan_id ${event.plan_id} differs from ${planId ?? ''}` });
    }
    if (!event.signature) {
      failures.push({ seq: event.seq, reason: 'missing signature' });
    } else if (!verify(null, signingPayload(event, previous), key, Buffer.from(event.signature, 'base64'))) {
      failures.push({ seq: event.seq, reason: 'signature mismatch' });
    }
    previous = event.signature;
  });

  return { valid: failures.length === 0, failures };
}
