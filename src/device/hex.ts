const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})+$/;

/** Decodes hex-encoded UTF-8 (how the firmware reports track metadata); other text passes through. */
export function dehex(value: string): string {
  if (!HEX_PATTERN.test(value)) {
    return value;
  }
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(Buffer.from(value, 'hex'));
  } catch {
    return value;
  }
}

export function hex(value: string): string {
  return Buffer.from(value, 'utf8').toString('hex');
}
