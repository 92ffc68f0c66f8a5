// Field lookup contract shared by the Wikipedia integration and the query actions

export const FieldKind = {
  POLAR_RADIUS: 'polar_radius',
  BIRTH_DATE: 'birth_date',
  ADDRESS: 'address',
  ELEVATION: 'elevation',
  RUNWAY_LENGTH: 'runway_length',
} as const;
export type FieldKind = (typeof FieldKind)[keyof typeof FieldKind];

/**
 * Which scalar property to read from a topic's summary box.
 * Runway lengths are keyed by the runway's designator.
 */
export type FieldSpec =
  | { kind: typeof FieldKind.POLAR_RADIUS }
  | { kind: typeof FieldKind.BIRTH_DATE }
  | { kind: typeof FieldKind.ADDRESS }
  | { kind: typeof FieldKind.ELEVATION }
  | { kind: typeof FieldKind.RUNWAY_LENGTH; runway: string };

export interface IFieldLookup {
  /**
   * Resolve `topic` to a reference page and read `field` from its summary box.
   *
   * Rejects with `TopicNotFoundError` when no page resolves, with
   * `FieldNotFoundError` when the page has no value for the field and with
   * `LookupUnavailableError` when the source cannot be reached.
   */
  lookupField(topic: string, field: FieldSpec): Promise<string>;
}
