import { describe, expect, it } from 'vitest';
import { resolveTenantId } from '../tenantResolver';

const NAMESPACED = 'custom:tenant_id';

describe('resolveTenantId', () => {
  it('prefers the tenant_id claim', () => {
    expect(
      resolveTenantId({ sub: 'c:user', tenant_id: 'a', [NAMESPACED]: 'b' }, NAMESPACED)
    ).toBe('a');
  });

  it('uses the namespaced claim next', () => {
    expect(resolveTenantId({ sub: 'c:user', [NAMESPACED]: 'b' }, NAMESPACED)).toBe('b');
  });

  it('honours a configured claim name', () => {
    expect(
      resolveTenantId({ sub: 'user', 'https://example.com/tenant': 'b' }, 'https://example.com/tenant')
    ).toBe('b');
  });

  it('falls back to the subject prefix before the first colon', () => {
    expect(resolveTenantId({ sub: 'c:user:extra' }, NAMESPACED)).toBe('c');
  });

  it('skips empty and non-string claims', () => {
    expect(resolveTenantId({ sub: 'c:user', tenant_id: '', [NAMESPACED]: 42 }, NAMESPACED)).toBe('c');
  });

  it('uses the whole subject when it has no colon', () => {
    expect(resolveTenantId({ sub: 'acme' }, NAMESPACED)).toBe('acme');
  });

  it.each([':user', ''])('returns null for subject %j with an empty prefix', (sub) => {
    expect(resolveTenantId({ sub }, NAMESPACED)).toBeNull();
  });
});
