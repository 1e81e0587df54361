import { z } from 'zod';

import { dataPath, readJsonFile } from './data';
import { ZIP_PATTERN } from './patterns';

const US_STATES = new Set(readJsonFile(dataPath('usps-states.json'), z.array(z.string().length(2))));

export function isValidStreet(street: string): boolean {
  const s = street.trim();
  return /\d/.test(s) && /[A-Za-z]/.test(s);
}

export function isValidCity(city: string): boolean {
  const c = city.trim();
  return c.length >= 2 && /^[A-Za-z\s.-]+$/.test(c);
}

export function isValidState(state: string): boolean {
  return US_STATES.has(state.trim().toUpperCase());
}

export function isValidZip(zip: string): boolean {
  return ZIP_PATTERN.test(zip.trim());
}

export type AddressParts = {
  street: string;
  city: string;
  state: string;
  zip: string;
};

/** All four parts must pass; there is no partially valid address. */
export function isValidAddress(parts: AddressParts): boolean {
  return (
    isValidStreet(parts.street) &&
    isValidCity(parts.city) &&
    isValidState(parts.state) &&
    isValidZip(parts.zip)
  );
}
