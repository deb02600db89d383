export const DEFAULT_OTP_LENGTH = 6;

export type OtpNormalization =
  | { ok: true; value: string }
  | { ok: false; reason: 'otp_missing' | 'otp_invalid_format' };

export function normalizeOtp(raw: string, length = DEFAULT_OTP_LENGTH): OtpNormalization {
  const value = raw.trim();
  if (!value) {
    return { ok: false, reason: 'otp_missing' };
  }

  if (value.length !== length || !/^\d+$/.test(value)) {
    return { ok: false, reason: 'otp_invalid_format' };
  }

  return { ok: true, value };
}

export function maskOtp(value: string): string {
  return `${value.slice(0, 2)}**`;
}
