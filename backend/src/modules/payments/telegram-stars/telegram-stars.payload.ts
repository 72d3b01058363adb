import * as crypto from 'crypto';

export type StarsPayloadData = {
  planIndex: number;
  days: number;
  issuedAt: number; // unix ms
};

function sign(base: string, userId: string, secret: string): string {
  // The payer id is signed but not carried: an invoice forwarded to someone else fails verification.
  return crypto.createHmac('sha256', secret).update(`${userId}|${base}`).digest('hex').slice(0, 16);
}

export function buildTelegramStarsInvoicePayload(args: StarsPayloadData & { userId: string; secret: string }): string {
  // Telegram invoice_payload hard limit is 128 bytes.
  const base = `plan:${args.planIndex}:${args.days}:${args.issuedAt}`;
  return `${base}:${sign(base, args.userId, args.secret)}`;
}

export function verifyTelegramStarsInvoicePayload(args: {
  payload: string;
  userId: string;
  secret: string;
}): StarsPayloadData | null {
  const parts = args.payload.split(':');
  if (parts.length !== 5) return null;
  const [kind, planIndexRaw, daysRaw, issuedAtRaw, sig] = parts;
  if (kind !== 'plan') return null;
  if (![planIndexRaw, daysRaw, issuedAtRaw].every((p) => /^\d+$/.test(p))) return null;
  const base = `plan:${planIndexRaw}:${daysRaw}:${issuedAtRaw}`;
  const expected = sign(base, args.userId, args.secret);
  if (sig.length !== expected.length || !crypto.timingSafeEqual(Buffer.from(sig), Buffer.from(expected))) return null;
  return { planIndex: Number(planIndexRaw), days: Number(daysRaw), issuedAt: Number(issuedAtRaw) };
}
