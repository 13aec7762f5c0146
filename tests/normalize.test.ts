import { MalformedRecordError } from '../core/src/errors';
import { addressKey, normNamePart, normalizeCompanyNumber, normalizeOfficer, splitFullName } from '../core/src/normalize';
import { john, william } from './fixtures';

describe('name parsing', () => {
  it('normalizes name parts for comparison', () => {
    expect(normNamePart('  Zoë  o.  Brien ')).toBe('ZOE O BRIEN');
    expect(normNamePart(undefined)).toBe('');
  });

  it('splits registry and natural name orders', () => {
    expect(splitFullName('GREGORY, William John')).toEqual({ surname: 'GREGORY', forenames: ['William', 'John'] });
    expect(splitFullName('Mr William John Gregory')).toEqual({ surname: 'Gregory', forenames: ['William', 'John'] });
    expect(splitFullName('Gregory')).toEqual({ surname: 'Gregory', forenames: [] });
  });
});

describe('normalizeOfficer', () => {
  it('derives surname and middle names from full_name', () => {
    const o = normalizeOfficer(john);
    expect(o.fullName).toBe('John Kennedy Gregory');
    expect(o.surname).toBe('Gregory');
    expect(o.surnameKey).toBe('GREGORY');
    expect(o.middleNames).toEqual(['Kennedy']);
    expect(o.middleNameKeys).toEqual(['KENNEDY']);
    expect(o.dateOfBirth).toEqual({ year: 1958, month: 3, day: null });
    expect(o.companyName).toBe('GREGORY DISTRIBUTION LIMITED');
  });

  it('prefers explicit surname and middle names', () => {
    const o = normalizeOfficer({ full_name: 'Anna Maria de la Cruz', surname: 'de la Cruz', middle_names: [] });
    expect(o.surname).toBe('de la Cruz');
    expect(o.surnameKey).toBe('DE LA CRUZ');
    expect(o.middleNames).toEqual([]);
  });

  it('dedupes middle names case-insensitively, keeping first casing', () => {
    const o = normalizeOfficer({ full_name: 'Ann Lee', middle_names: ['Rose', 'ROSE', ' Anne '] });
    expect(o.middleNames).toEqual(['Rose', 'Anne']);
    expect(o.middleNameKeys).toEqual(['ROSE', 'ANNE']);
  });

  it('keeps appointed_before distinct from appointed_on', () => {
    const o = normalizeOfficer(william);
    expect(o.roles).toEqual([
      {
        companyNumber: '01329163',
        roleType: 'director',
        appointment: { kind: 'not_later_than', value: { year: 1991, month: 7, day: 20 } },
        resignedOn: { year: 2010, month: 7, day: 29 },
      },
    ]);
  });

  it('pads numeric company numbers and drops roles without one', () => {
    const o = normalizeOfficer({
      full_name: 'Ann Lee',
      roles: [{ company_number: 1329163 }, { company_number: '  ' }, { role_type: 'director' }, { company_number: 'sc123456', appointed_on: 'soon' }],
    });
    expect(o.roles).toEqual([
      { companyNumber: '01329163', roleType: 'unknown', appointment: { kind: 'unknown' }, resignedOn: null },
      { companyNumber: 'SC123456', roleType: 'unknown', appointment: { kind: 'unknown' }, resignedOn: null },
    ]);
  });

  it('degrades bad optional fields to absent', () => {
    const o = normalizeOfficer({
      full_name: 'Ann Lee',
      date_of_birth: 12345,
      middle_names: 'Rose',
      address: { full_address: '1 High St', latitude: 95, longitude: 0 },
      company_name: '   ',
      roles: 'none',
    });
    expect(o.dateOfBirth).toBeNull();
    expect(o.middleNames).toEqual([]);
    expect(o.address).toEqual({ fullAddress: '1 High St', addressKey: '1 HIGH ST', coordinates: null });
    expect(o.companyName).toBeNull();
    expect(o.roles).toEqual([]);
  });

  it('keeps coordinates only as a complete pair', () => {
    expect(normalizeOfficer({ full_name: 'Ann Lee', address: { full_address: '1 High St', latitude: 51.5 } }).address?.coordinates).toBeNull();
    expect(normalizeOfficer({ full_name: 'Ann Lee', address: { full_address: '', latitude: 51.5, longitude: -0.12 } }).address).toEqual({
      fullAddress: '',
      addressKey: '',
      coordinates: { latitude: 51.5, longitude: -0.12 },
    });
  });

  it('rejects records without a usable name', () => {
    expect(() => normalizeOfficer({ roles: [] })).toThrow(MalformedRecordError);
    expect(() => normalizeOfficer(null)).toThrow(MalformedRecordError);
    try {
      normalizeOfficer({ full_name: '   ' });
      throw new Error('expected failure');
    } catch (e) {
      expect(e).toBeInstanceOf(MalformedRecordError);
      if (e instanceof MalformedRecordError) expect(e.issues).toEqual(['full_name: full_name must not be empty']);
    }
  });

  it('reports a missing full_name', () => {
    try {
      normalizeOfficer({ surname: 'Lee' });
      throw new Error('expected failure');
    } catch (e) {
      expect(e).toBeInstanceOf(MalformedRecordError);
      if (e instanceof MalformedRecordError) expect(e.issues).toEqual(['full_name: full_name is required']);
    }
  });
});

test('addressKey ignores case and spacing around commas', () => {
  expect(addressKey(' 12 mill lane ,leeds ')).toBe('12 MILL LANE, LEEDS');
  expect(normalizeCompanyNumber(' 42 ')).toBe('00000042');
  expect(normalizeCompanyNumber('OC301234')).toBe('OC301234');
});
