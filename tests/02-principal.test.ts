// =============================================================================
// GATEKEEP — Test Suite 02: Principal Model
// =============================================================================

import { AuthError } from '../src/authorization/errors';
import {
  copyPrincipal,
  createPrincipal,
  principalFromRecord,
  toPrincipalRecord,
  withPermissions,
  withRoles,
} from '../src/authorization/principal';

describe('Principal', () => {
  test('createPrincipal defaults to no roles and no direct permissions', () => {
    const principal = createPrincipal({ id: '7', displayName: 'guest' });
    expect(principal.roles).toEqual([]);
    expect(principal.directPermissions.size).toBe(0);
  });

  test('duplicate roles are dropped, order is kept', () => {
    const principal = createPrincipal({
      id: '7',
      displayName: 'guest',
      roles: ['user', 'moderator', 'user'],
    });
    expect(principal.roles).toEqual(['user', 'moderator']);
  });

  test('principals are frozen', () => {
    const principal = createPrincipal({ id: '7', displayName: 'guest', roles: ['user'] });
    expect(Object.isFrozen(principal)).toBe(true);
    expect(Object.isFrozen(principal.roles)).toBe(true);
    expect(Object.isFrozen(principal.directPermissions)).toBe(true);
  });

  test('direct permissions refuse changes', () => {
    const principal = createPrincipal({ id: '7', displayName: 'guest', permissions: ['view_profile'] });
    const permissions = principal.directPermissions;
    expect(permissions).toBeInstanceOf(Set);
    if (!(permissions instanceof Set)) return;

    expect(() => permissions.add('delete_user')).toThrow('Principal permissions are read-only');
    expect(() => permissions.delete('view_profile')).toThrow('Principal permissions are read-only');
    expect(() => permissions.clear()).toThrow('Principal permissions are read-only');
    expect([...principal.directPermissions]).toEqual(['view_profile']);
  });

  test('copyPrincipal returns an equal, separate principal', () => {
    const original = createPrincipal({ id: '3', displayName: 'special', roles: ['user'], permissions: ['x'] });
    const copy = copyPrincipal(original);
    expect(copy).not.toBe(original);
    expect(copy.directPermissions).not.toBe(original.directPermissions);
    expect(copy).toEqual(original);
  });

  test('withRoles and withPermissions return new principals', () => {
    const base = createPrincipal({ id: '1', displayName: 'admin' });
    const promoted = withPermissions(withRoles(base, 'admin', 'user'), 'special_access');

    expect(base.roles).toEqual([]);
    expect(promoted.roles).toEqual(['admin', 'user']);
    expect([...promoted.directPermissions]).toEqual(['special_access']);
    expect(promoted.id).toBe('1');
  });

  test('toPrincipalRecord gives a JSON-friendly shape with sorted permissions', () => {
    const principal = createPrincipal({
      id: '3',
      displayName: 'special_user',
      roles: ['user'],
      permissions: ['zebra', 'apple'],
    });
    expect(toPrincipalRecord(principal)).toEqual({
      id: '3',
      displayName: 'special_user',
      roles: ['user'],
      permissions: ['apple', 'zebra'],
    });
  });

  describe('principalFromRecord', () => {
    test('reads id, displayName, roles and permissions', () => {
      const principal = principalFromRecord({
        id: '2',
        displayName: 'regular_user',
        roles: ['user'],
        permissions: ['custom_permission'],
      });
      expect(principal.id).toBe('2');
      expect(principal.displayName).toBe('regular_user');
      expect(principal.roles).toEqual(['user']);
      expect(principal.directPermissions.has('custom_permission')).toBe(true);
    });

    test('displayName falls back to id', () => {
      expect(principalFromRecord({ id: '9' }).displayName).toBe('9');
    });

    test.each([
      ['not an object', 'token'],
      ['null', null],
      ['missing id', { displayName: 'x' }],
      ['empty id', { id: '' }],
      ['roles not a list', { id: '1', roles: 'admin' }],
      ['non-string permission', { id: '1', permissions: [42] }],
    ])('rejects %s as InvalidToken', (_label, record) => {
      try {
        principalFromRecord(record);
        throw new Error('expected principalFromRecord to throw');
      } catch (err) {
        expect(err).toBeInstanceOf(AuthError);
        expect(err).toMatchObject({ kind: 'InvalidToken' });
      }
    });
  });
});
