import type { QldIdentifier } from '../types';
import { attributeText, chunk, sqlQuote, unique } from '../utils';
import { CadastreAdapter } from './base';

export const QLD_IN_CHUNK = 100;

export class QldAdapter extends CadastreAdapter<QldIdentifier> {
  readonly jurisdiction = 'QLD';

  buildWhere(identifiers: readonly QldIdentifier[]): string[] {
    const lotPlans = unique(identifiers.map((identifier) => this.identifierKey(identifier)));
    return chunk(lotPlans, QLD_IN_CHUNK).map(
      (group) => `UPPER(lotidstring) IN (${group.map(sqlQuote).join(', ')})`
    );
  }

  identifierKey(identifier: QldIdentifier): string {
    return `${identifier.lot}${identifier.plan}`.toUpperCase();
  }

  featureKeys(attributes: Record<string, unknown>): string[] {
    const keys = [attributeText(attributes.lotidstring), attributeText(attributes.lotplan)];
    const lot = attributeText(attributes.lot);
    const plan = attributeText(attributes.plan);
    if (lot && plan) {
      keys.push(`${lot}${plan}`);
    }
    return unique(keys.filter((key): key is string => key !== undefined).map((key) => key.toUpperCase().replace(/\s+/g, '')));
  }

  protected fallbackId(attributes: Record<string, unknown>): string {
    return this.featureKeys(attributes)[0] ?? 'QLD parcel';
  }
}
