import type { Gender, HasKids, Role } from '../types';

export function inferRole(gender: Gender, hasKids: HasKids): Role {
  if (hasKids === 'No') return 'individual';
  switch (gender) {
    case 'Female':
      return 'mother';
    case 'Male':
      return 'father';
    case 'Gender Neutral':
      return 'parent';
  }
}
