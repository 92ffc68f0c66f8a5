import { FieldKind, type IFieldLookup } from '@infobox-query/integrations';
import { answers, defineAction } from './action.js';

const withUnit = (value: string, unit: string): string => `${value} ${unit}`;

/**
 * Actions answering infobox questions. Lookup failures are not caught here;
 * they reach whoever called `dispatch`.
 */
export function createFieldActions(lookup: IFieldLookup) {
  return {
    birth_date: defineAction({
      arity: 1,
      description: 'Birth date of the named person',
      run: async ([person]) => answers([await lookup.lookupField(person, { kind: FieldKind.BIRTH_DATE })]),
    }),

    polar_radius: defineAction({
      arity: 1,
      description: 'Polar radius of the named planet',
      run: async ([planet]) => answers([await lookup.lookupField(planet, { kind: FieldKind.POLAR_RADIUS })]),
    }),

    address: defineAction({
      arity: 1,
      description: 'Address of the named school',
      run: async ([school]) => answers([await lookup.lookupField(school, { kind: FieldKind.ADDRESS })]),
    }),

    elevation: defineAction({
      arity: 1,
      description: 'Elevation of the named airport, in feet',
      run: async ([airport]) =>
        answers([withUnit(await lookup.lookupField(airport, { kind: FieldKind.ELEVATION }), 'ft')]),
    }),

    runway_length: defineAction({
      arity: 2,
      description: 'Length of a runway at the named airport, in feet',
      run: async ([runway, airport]) =>
        answers([withUnit(await lookup.lookupField(airport, { kind: FieldKind.RUNWAY_LENGTH, runway }), 'ft')]),
    }),
  };
}
