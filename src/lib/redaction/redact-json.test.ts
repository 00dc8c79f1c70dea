import { describe, expect, it } from 'vitest';

import { redactJsonSecrets } from '@/lib/redaction/redact-json';

describe('redactJsonSecrets', () => {
  it('redacts credential and session keys recursively', () => {
    const input = {
      VCENTER_PASSWORD: 'p',
      nested: { session_token: 't', endpoint: 'https://vc.example.test' },
      list: [{ cookie: 'vmware_soap_session=abc' }, { Authorization: 'Basic xyz' }, { session_id: 's' }],
    };

    expect(redactJsonSecrets(input)).toEqual({
      VCENTER_PASSWORD: '***',
      nested: { session_token: '***', endpoint: 'https://vc.example.test' },
      list: [{ cookie: '***' }, { Authorization: '***' }, { session_id: '***' }],
    });
  });

  it('leaves primitives unchanged', () => {
    expect(redactJsonSecrets('x')).toBe('x');
    expect(redactJsonSecrets(1)).toBe(1);
    expect(redactJsonSecrets(null)).toBe(null);
  });
});
