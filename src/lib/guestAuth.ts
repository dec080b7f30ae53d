import crypto from 'crypto';

function formatUuidFromHex(hex: string): string {
  const chars = hex.slice(0, 32).split('');
  chars[12] = '4';
  chars[16] = ((parseInt(chars[16], 16) & 0x3) | 0x8).toString(16);
  return `${chars.slice(0, 8).join('')}-${chars.slice(8, 12).join('')}-${chars.slice(12, 16).join('')}-${chars.slice(16, 20).join('')}-${chars.slice(20, 32).join('')}`;
}

function normalizeFingerprint(fingerprint: string | null | undefined): string {
  return (fingerprint || '').trim() || 'shared-device';
}

// Same device, same guest: progress follows the fingerprint across reinstalls
export function deriveGuestUserId(fingerprint: string | null | undefined): string {
  const normalized = normalizeFingerprint(fingerprint);
  const hex = crypto.createHash('sha256').update(`discovery-keys-guest:${normalized}`).digest('hex');
  return formatUuidFromHex(hex);
}
