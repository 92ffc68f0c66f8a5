import { FieldKind, type FieldSpec } from '../types.js';

const NOT_FOUND_MESSAGES: Record<FieldKind, string> = {
  [FieldKind.POLAR_RADIUS]: 'Page infobox has no polar radius information',
  [FieldKind.BIRTH_DATE]: 'Page infobox has no birth information (at least none in xxxx-xx-xx format)',
  [FieldKind.ADDRESS]: 'Page infobox has no address information',
  [FieldKind.ELEVATION]: 'Page infobox has no elevation information',
  [FieldKind.RUNWAY_LENGTH]: 'Page infobox has no runway length information',
};

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

/**
 * Expression locating a field in cleaned infobox text; the value is the `value` group.
 */
export function fieldPattern(field: FieldSpec): RegExp {
  switch (field.kind) {
    case FieldKind.POLAR_RADIUS:
      return /Polar radius.*?(?: ?\d+ )?(?<value>[\d,.]+).*?km/is;
    case FieldKind.BIRTH_DATE:
      return /Born\D*(?<value>\d{4}-\d{2}-\d{2})/is;
    case FieldKind.ADDRESS:
      return /Address\s*:?\s*(?<value>[\d\w\s.,]+?)(?=\s*(?:Street|Coordinates)|$)/is;
    case FieldKind.ELEVATION:
      return /Elevation AMSL.*?(?<value>[\d,.]+).*?ft/is;
    case FieldKind.RUNWAY_LENGTH:
      return new RegExp(`${escapeRegExp(field.runway)}\\n(?<value>[^\\n]*)`, 'is');
  }
}

export function fieldNotFoundMessage(field: FieldSpec): string {
  return NOT_FOUND_MESSAGES[field.kind];
}

export function extractField(text: string, field: FieldSpec): string | undefined {
  const value = fieldPattern(field).exec(text)?.groups?.['value']?.trim();
  return value ? value : undefined;
}
