import { describe, expect, it } from 'vitest';

import { extractRecordId, toPersonRecord } from '../person-records.js';

describe('toPersonRecord', () => {
  it('reads the current role from the experience list when the flat fields are missing', () => {
    const record = toPersonRecord({
      member_id: 42,
      name: 'Ada Park',
      location_full: 'Berlin, Germany',
      professional_network_url: 'http://www.example.com/in/ada-park/',
      experience: [
        { title: 'Research Intern', company_name: 'Initech', date_to: '2019-08' },
        { title: 'Staff ML Engineer', company_name: 'Acme', date_to: null }
      ]
    });

    expect(record).toMatchObject({
      recordId: '42',
      fullName: 'Ada Park',
      currentTitle: 'Staff ML Engineer',
      currentOrganization: 'Acme',
      location: 'Berlin, Germany',
      profileUrl: 'https://www.example.com/in/ada-park'
    });
  });

  it('drops documents without an id', () => {
    expect(toPersonRecord({ full_name: 'No Id' })).toBeNull();
    expect(extractRecordId({ employee_id: ' e-7 ' })).toBe('e-7');
  });
});
