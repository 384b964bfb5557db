/**
 * Hides short strings inside Discord text fields using zero-width characters.
 *
 * The carrier renders as an empty string but survives the round trip through
 * an embed footer, which lets a panel message remember its role ids without
 * any storage on our side.
 */

const ZERO_BIT = '\u200B';
const ONE_BIT = '\u200C';
const PAYLOAD_MARKER = '\u200D';

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

export interface RolePair {
  participantId: bigint;
  spectatorId: bigint;
}

export const hidePayload = (plaintext: string): string => {
  const encoded = Buffer.from(plaintext, 'utf8').toString('base64');
  let bits = '';
  for (const byte of Buffer.from(encoded, 'ascii')) {
    bits += byte.toString(2).padStart(8, '0');
  }
  return PAYLOAD_MARKER + [...bits].map((bit) => (bit === '1' ? ONE_BIT : ZERO_BIT)).join('');
};

const revealHidden = (carrier: string): string | null => {
  const bits = [...carrier]
    .filter((ch) => ch === ZERO_BIT || ch === ONE_BIT)
    .map((ch) => (ch === ONE_BIT ? '1' : '0'))
    .join('');
  if (bits.length % 8 !== 0) {
    return null;
  }

  const bytes = new Uint8Array(bits.length / 8);
  for (let index = 0; index < bytes.length; index += 1) {
    bytes[index] = Number.parseInt(bits.slice(index * 8, index * 8 + 8), 2);
  }

  const base64 = Buffer.from(bytes).toString('latin1');
  if (!BASE64_PATTERN.test(base64)) {
    return null;
  }

  try {
    return utf8Decoder.decode(Buffer.from(base64, 'base64'));
  } catch {
    return null;
  }
};

// Panels posted before the footer was obfuscated carry the ids in plain text.
const revealLegacy = (carrier: string): string | null =>
  carrier.includes('participant=') && carrier.includes('spectator=') ? carrier : null;

export const revealPayload = (carrier: string | null | undefined): string | null => {
  if (!carrier) {
    return null;
  }
  if (carrier.startsWith(PAYLOAD_MARKER)) {
    return revealHidden(carrier);
  }
  return revealLegacy(carrier);
};

export const formatRolePair = ({ participantId, spectatorId }: RolePair): string =>
  `participant=${participantId}|spectator=${spectatorId}`;

const MAX_ROLE_ID = 0xffff_ffff_ffff_ffffn;

const parseUnsigned = (value: string): bigint | null => {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  const parsed = BigInt(trimmed);
  return parsed <= MAX_ROLE_ID ? parsed : null;
};

export const parseRolePair = (payload: string): RolePair | null => {
  let participantId: bigint | null = null;
  let spectatorId: bigint | null = null;

  for (const part of payload.split('|')) {
    const separator = part.indexOf('=');
    if (separator < 0) {
      continue;
    }
    const key = part.slice(0, separator).trim();
    const value = part.slice(separator + 1);
    if (key === 'participant') {
      participantId = parseUnsigned(value);
    } else if (key === 'spectator') {
      spectatorId = parseUnsigned(value);
    }
  }

  if (participantId === null || spectatorId === null) {
    return null;
  }
  return { participantId, spectatorId };
};

export const encodeRolePair = (pair: RolePair): string => hidePayload(formatRolePair(pair));

export const decodeRolePair = (carrier: string | null | undefined): RolePair | null => {
  const payload = revealPayload(carrier);
  return payload === null ? null : parseRolePair(payload);
};
