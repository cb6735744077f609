import type { SaIdentifier } from '../types';
import { attributeText, chunk, sqlQuote, unique } from '../utils';
import { CadastreAdapter } from './base';

export const SA_PARCEL_CHUNK = 80;
export const SA_TITLE_CHUNK = 100;

function parcelKey(plan: string, parcel: string): string {
  return `PARCEL:${plan}:${parcel}`.toUpperCase();
}

function titleKey(volume: string, folio: string): string {
  return `TITLE:${volume}:${folio}`;
}

/**
 * SA parcels are requested either by plan and parcel or by certificate of
 * title volume and folio. The register prefix of a title is not a layer field.
 */
export class SaAdapter extends CadastreAdapter<SaIdentifier> {
  readonly jurisdiction = 'SA';

  buildWhere(identifiers: readonly SaIdentifier[]): string[] {
    const parcelTerms: string[] = [];
    const titleTerms: string[] = [];

    for (const identifier of identifiers) {
      if (identifier.kind === 'parcel') {
        parcelTerms.push(`(UPPER(plan)=${sqlQuote(identifier.plan)} AND UPPER(parcel)=${sqlQuote(identifier.lot)})`);
      } else {
        titleTerms.push(`(volume=${sqlQuote(identifier.volume)} AND folio=${sqlQuote(identifier.folio)})`);
      }
    }

    return [
      ...chunk(unique(parcelTerms), SA_PARCEL_CHUNK).map((group) => group.join(' OR ')),
      ...chunk(unique(titleTerms), SA_TITLE_CHUNK).map((group) => group.join(' OR ')),
    ];
  }

  identifierKey(identifier: SaIdentifier): string {
    return identifier.kind === 'parcel'
      ? parcelKey(identifier.plan, identifier.lot)
      : titleKey(identifier.volume, identifier.folio);
  }

  featureKeys(attributes: Record<string, unknown>): string[] {
    const keys: string[] = [];
    const plan = attributeText(attributes.plan);
    const parcel = attributeText(attributes.parcel);
    if (plan && parcel) {
      keys.push(parcelKey(plan, parcel));
    }
    const volume = attributeText(attributes.volume);
    const folio = attributeText(attributes.folio);
    if (volume && folio) {
      keys.push(titleKey(volume, folio));
    }
    return keys;
  }

  protected fallbackId(attributes: Record<string, unknown>): string {
    const plan = attributeText(attributes.plan);
    const parcel = attributeText(attributes.parcel);
    if (plan && parcel) {
      return `${parcel}//${plan}`.toUpperCase();
    }
    const volume = attributeText(attributes.volume);
    const folio = attributeText(attributes.folio);
    return volume && folio ? `${volume}/${folio}` : 'SA parcel';
  }
}
