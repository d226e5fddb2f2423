import { AdminError, AdminErrorCode, errorMessage, isAdminError } from '../../../src/shared/errors.js';

describe('AdminError', () => {
  it('carries a code and context', () => {
    const err = new AdminError(AdminErrorCode.NOT_FOUND, 'No such entry', { dn: 'uid=alice' });

    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('AdminError');
    expect(err.code).toBe(AdminErrorCode.NOT_FOUND);
    expect(err.context).toEqual({ dn: 'uid=alice' });
  });

  it('is recognised by isAdminError with or without a code', () => {
    const err = new AdminError(AdminErrorCode.ALREADY_EXISTS, 'exists');

    expect(isAdminError(err)).toBe(true);
    expect(isAdminError(err, AdminErrorCode.ALREADY_EXISTS)).toBe(true);
    expect(isAdminError(err, AdminErrorCode.NOT_FOUND)).toBe(false);
    expect(isAdminError(new Error('plain'))).toBe(false);
  });

  it('formats unknown thrown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('text')).toBe('text');
  });
});
