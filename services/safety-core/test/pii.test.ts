import { createPiiHasher, hashPii, hashTextForAudit } from '../src/lib/pii';

const SALT = 'test-salt-test-salt-test-salt-0000';

describe('PII hashing', () => {
  it('should hash deterministically for one salt', () => {
    expect(hashPii('student-1', SALT)).toBe(hashPii('student-1', SALT));
    expect(hashPii('student-1', SALT)).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should give different hashes for different salts', () => {
    expect(hashPii('student-1', SALT)).not.toBe(hashPii('student-1', `${SALT}-other`));
  });

  it('should refuse a short salt', () => {
    expect(() => hashPii('student-1', 'short')).toThrow('PII salt must be at least 32 characters');
  });

  it('should hash audit text without a salt', () => {
    expect(hashTextForAudit('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });

  it('should bind a configured salt', () => {
    expect(createPiiHasher(SALT)('student-1')).toBe(hashPii('student-1', SALT));
  });

  it('should fall back to an ephemeral salt that is stable per hasher', () => {
    const hasher = createPiiHasher(null);
    expect(hasher('student-1')).toBe(hasher('student-1'));
    expect(hasher('student-1')).not.toBe(createPiiHasher(null)('student-1'));
  });
});
