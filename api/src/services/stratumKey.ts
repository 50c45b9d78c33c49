import { IntegrityError } from '../models/errors.js';
import type { AxisValue, CategoryValues, StratumKey } from '../models/types.js';

export function stratumKeyOf(zoneId: string, categories: CategoryValues, fields: readonly string[]): StratumKey {
  const values = fields.map((field) => {
    const value = categories[field];
    if (value === undefined) {
      throw new IntegrityError(`Missing category field "${field}" for zone ${zoneId}`, { zoneId });
    }
    return value;
  });
  return [zoneId, ...values];
}

export function encodeStratum(stratum: StratumKey): string {
  return JSON.stringify(stratum);
}

export function encodeStratumAxis(stratum: StratumKey, axis: AxisValue): string {
  return JSON.stringify([axis, ...stratum]);
}

export function categoriesOf(stratum: StratumKey, fields: readonly string[]): CategoryValues {
  const [, ...values] = stratum;
  const categories: CategoryValues = {};
  fields.forEach((field, index) => {
    const value = values[index];
    if (value !== undefined) {
      categories[field] = value;
    }
  });
  return categories;
}

export function formatStratum(stratum: StratumKey): string {
  const [zoneId, ...values] = stratum;
  return values.length === 0 ? zoneId : `${zoneId} / ${values.join(' / ')}`;
}
