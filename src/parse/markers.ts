import type { CareFocus, Gender, HasKids } from '../types';

export interface GenderHeader {
  marker: string;
  label: string;
  gender: Gender;
}

export interface ContextHeader {
  /** Every emoji accepted in front of this header. The first one is used when writing. */
  markers: readonly string[];
  label: string;
  careFocus: CareFocus;
  hasKids: HasKids;
}

export const GENDER_HEADERS: readonly GenderHeader[] = [
  { marker: '💗', label: 'Female', gender: 'Female' },
  { marker: '🩵', label: 'Male', gender: 'Male' },
  { marker: '💚', label: 'Gender Neutral', gender: 'Gender Neutral' }
];

// "Myself (With Kids)" is drawn with a mother, father or speech-bubble emoji depending on gender
export const CONTEXT_HEADERS: readonly ContextHeader[] = [
  { markers: ['🩺'], label: 'Myself (No Kids)', careFocus: 'Myself', hasKids: 'No' },
  { markers: ['👩‍👧', '👨‍👧', '💬'], label: 'Myself (With Kids)', careFocus: 'Myself', hasKids: 'Yes' },
  { markers: ['👶'], label: 'My Kids', careFocus: 'My Kids', hasKids: 'Yes' },
  { markers: ['🏡'], label: 'My Family (No Kids)', careFocus: 'My Family', hasKids: 'No' },
  { markers: ['💞'], label: 'My Family (With Kids)', careFocus: 'My Family', hasKids: 'Yes' }
];

export const CONTEXT_MARKERS: readonly string[] = [...new Set(CONTEXT_HEADERS.flatMap(h => h.markers))];

export function genderMarker(gender: Gender): string {
  const header = GENDER_HEADERS.find(h => h.gender === gender);
  if (!header) throw new Error(`No marker for gender ${gender}`);
  return header.marker;
}

export function findContextHeader(careFocus: CareFocus, hasKids: HasKids): ContextHeader | undefined {
  return CONTEXT_HEADERS.find(h => h.careFocus === careFocus && h.hasKids === hasKids);
}
