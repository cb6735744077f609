import type { NswIdentifier } from '../types';
import { attributeText, chunk, sqlQuote, unique } from '../utils';
import { CadastreAdapter } from './base';

// Keeps request URLs inside ArcGIS length limits.
export const NSW_IN_CHUNK = 150;

/**
 * The NSW layer's lotidstring is `lot/section/plan`, with an empty section
 * when there is none (`13//DP1242624`).
 */
export function nswLotIdString(identifier: NswIdentifier): string {
  return `${identifier.lot}/${identifier.section ?? ''}/${identifier.plan}`.toUpperCase();
}

export class NswAdapter extends CadastreAdapter<NswIdentifier> {
  readonly jurisdiction = 'NSW';

  buildWhere(identifiers: readonly NswIdentifier[]): string[] {
    const lotIds = unique(identifiers.map(nswLotIdString));
    return chunk(lotIds, NSW_IN_CHUNK).map(
      (group) => `UPPER(lotidstring) IN (${group.map(sqlQuote).join(', ')})`
    );
  }

  identifierKey(identifier: NswIdentifier): string {
    return nswLotIdString(identifier);
  }

  featureKeys(attributes: Record<string, unknown>): string[] {
    const lotId = attributeText(attributes.lotidstring);
    if (lotId) {
      return [lotId.toUpperCase().replace(/\s+/g, '')];
    }

    const lot = attributeText(attributes.lotnumber);
    const plan = attributeText(attributes.planlabel);
    if (!lot || !plan) {
      return [];
    }
    const section = attributeText(attributes.sectionnumber) ?? '';
    return [`${lot}/${section}/${plan}`.toUpperCase().replace(/\s+/g, '')];
  }

  protected fallbackId(attributes: Record<string, unknown>): string {
    const [lotId] = this.featureKeys(attributes);
    if (!lotId) {
      return 'NSW parcel';
    }
    const [lot, section, plan] = lotId.split('/');
    return section ? `${lot}/${section}//${plan}` : `${lot}//${plan}`;
  }
}
