import { parseLdif, renderAddRecord, renderAddValuesRecord } from '../../../src/directory/ldif.js';

describe('renderAddRecord', () => {
  it('writes one line per value', () => {
    const ldif = renderAddRecord('cn=alice,ou=groups,dc=example,dc=local', {
      objectClass: ['top', 'posixGroup'],
      cn: 'alice',
      gidNumber: '1001',
    });

    expect(ldif).toBe(
      [
        'dn: cn=alice,ou=groups,dc=example,dc=local',
        'objectClass: top',
        'objectClass: posixGroup',
        'cn: alice',
        'gidNumber: 1001',
        '',
      ].join('\n'),
    );
  });

  it('base64-encodes values that are not safe strings', () => {
    const ldif = renderAddRecord('uid=anna,ou=people,dc=example,dc=local', { cn: 'Анна', description: ' leading space' });

    expect(ldif).toContain(`cn:: ${Buffer.from('Анна', 'utf8').toString('base64')}\n`);
    expect(ldif).toContain(`description:: ${Buffer.from(' leading space', 'utf8').toString('base64')}\n`);
  });
});

describe('renderAddValuesRecord', () => {
  it('builds a modify/add change record', () => {
    expect(renderAddValuesRecord('cn=students,ou=groups,dc=example,dc=local', 'memberUid', ['alice'])).toBe(
      'dn: cn=students,ou=groups,dc=example,dc=local\nchangetype: modify\nadd: memberUid\nmemberUid: alice\n-\n',
    );
  });
});

describe('parseLdif', () => {
  it('splits records, unfolds continuation lines and decodes base64', () => {
    const output = [
      '# extended LDIF',
      'dn: uid=alice,ou=people,dc=example,dc=local',
      'uid: alice',
      'homeDirectory: /home/ali',
      ' ce',
      '',
      'dn: uid=anna,ou=people,dc=example,dc=local',
      `cn:: ${Buffer.from('Анна', 'utf8').toString('base64')}`,
      'uidNumber: 1003',
      '',
    ].join('\n');

    expect(parseLdif(output)).toEqual([
      { dn: 'uid=alice,ou=people,dc=example,dc=local', attributes: { uid: ['alice'], homeDirectory: ['/home/alice'] } },
      { dn: 'uid=anna,ou=people,dc=example,dc=local', attributes: { cn: ['Анна'], uidNumber: ['1003'] } },
    ]);
  });

  it('collects repeated attributes', () => {
    const hits = parseLdif('dn: cn=students,ou=groups,dc=example,dc=local\nmemberUid: alice\nmemberUid: bob\n');
    expect(hits[0]?.attributes['memberUid']).toEqual(['alice', 'bob']);
  });

  it('returns nothing for empty output', () => {
    expect(parseLdif('')).toEqual([]);
  });
});
