import { isRecord, readNonEmptyString } from '../../../../../common/utils/object.utils';
import { parseMoney, type FraudVerdict, type Money } from '../../../domain';
import type { CatalogProduct } from '../../../application/ports/catalog.port';

export function parseCatalogProduct(body: unknown): CatalogProduct | undefined {
  if (!isRecord(body)) {
    return undefined;
  }

  const id = readNonEmptyString(body, 'id');
  const price = parseMoney(body.price);
  if (!id || !price) {
    return undefined;
  }

  return { id, name: readNonEmptyString(body, 'name') ?? id, price };
}

export function parseQuote(body: unknown): Money | undefined {
  return isRecord(body) ? parseMoney(body.cost) : undefined;
}

export function parseTracking(body: unknown): { trackingId: string } | undefined {
  const trackingId = isRecord(body) ? readNonEmptyString(body, 'trackingId') : undefined;
  return trackingId ? { trackingId } : undefined;
}

export function parseTransaction(body: unknown): { transactionId: string } | undefined {
  const transactionId = isRecord(body) ? readNonEmptyString(body, 'transactionId') : undefined;
  return transactionId ? { transactionId } : undefined;
}

export function parseReversal(body: unknown): { reversalId: string } | undefined {
  const reversalId = isRecord(body) ? readNonEmptyString(body, 'reversalId') : undefined;
  return reversalId ? { reversalId } : undefined;
}

export function parseFraudVerdict(body: unknown): FraudVerdict | undefined {
  if (!isRecord(body) || typeof body.flagged !== 'boolean') {
    return undefined;
  }

  const reason = readNonEmptyString(body, 'reason');
  return reason ? { flagged: body.flagged, reason } : { flagged: body.flagged };
}

export function parseAccepted(body: unknown): { accepted: boolean } | undefined {
  if (!isRecord(body) || typeof body.accepted !== 'boolean') {
    return undefined;
  }

  return { accepted: body.accepted };
}
