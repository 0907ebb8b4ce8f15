/**
 * Order-ID normalizer
 * Best-effort rewrite of a customer-typed order reference into the
 * storefront's fulfillment order id ("Shopify #91057.1"). Never rejects input:
 * anything unrecognized passes through so a human can still act on it.
 */

const CANONICAL_PATTERN = /^shopify #.*\.1$/i;

export function normalizeOrderId(raw: string): string {
  const value = raw.trim();
  if (!value) {
    return '';
  }

  // Already suffixed. Must come before the digit rule, which would fold ".1" into the digits.
  if (CANONICAL_PATTERN.test(value)) {
    return value;
  }

  const lower = value.toLowerCase();
  const digits = value.replace(/\D/g, '');
  if (digits && (digits === value || lower.startsWith('order') || lower.startsWith('shopify'))) {
    return `Shopify #${digits}.1`;
  }

  if (lower.startsWith('shopify #') && !value.includes('.1')) {
    return `${value}.1`;
  }

  return value;
}
