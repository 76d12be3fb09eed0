export interface IpHistoryRepositoryPort {
  /** Closes the previous current public IP (when different) and makes `ip` current. */
  recordPublicIp(ip: string): Promise<void>;
  currentPublicIp(): Promise<string | null>;

  /** Inserts enabled targets, leaving existing rows untouched. Returns how many were new. */
  seedDnsTargets(fqdns: string[]): Promise<number>;
  listEnabledDnsTargets(): Promise<string[]>;

  currentDnsIp(fqdn: string): Promise<string | null>;
  recordDnsIp(fqdn: string, ip: string): Promise<void>;
}
