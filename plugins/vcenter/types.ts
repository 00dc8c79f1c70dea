export type PreferredVcenterVersion = '6.5-6.7' | '7.0-8.x';

export type VcenterSourceConfig = {
  endpoint: string;
  username: string;
  password: string;
  preferredVersion: PreferredVcenterVersion;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
};
