import type { RawOfficerRecord } from '../core/src/types';

// Father and son directors of the same distribution company
export const william: RawOfficerRecord = {
  full_name: 'William John Gregory',
  date_of_birth: '1924-10',
  roles: [{ company_number: '01329163', role_type: 'director', appointed_before: '1991-07-20', resigned_on: '2010-07-29' }],
  address: { full_address: '12 Mill Lane, Leeds, LS1 4AB' },
  company_name: 'GREGORY DISTRIBUTION LIMITED',
};

export const john: RawOfficerRecord = {
  full_name: 'John Kennedy Gregory',
  date_of_birth: '1958-03',
  roles: [{ company_number: '01329163', role_type: 'director', appointed_on: '1991-07-20' }],
  address: { full_address: '12 mill lane,  Leeds, LS1 4AB' },
  company_name: 'GREGORY DISTRIBUTION LIMITED',
};

export const unrelated: RawOfficerRecord = {
  full_name: 'Carlos Diaz',
  roles: [{ company_number: '09876543', role_type: 'director', appointed_on: '2005-06-01' }],
};
