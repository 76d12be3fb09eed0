export interface InternalIpRecord {
  hostname: string;
  interfaceName: string;
  ip: string;
  isIpv6: boolean;
  macAddress: string | null;
}

export interface CurrentInternalIp extends InternalIpRecord {
  firstUseAt: Date | string;
}

export interface InternalIpRepositoryPort {
  /** Closes the previous current address of the host/interface and upserts this one. */
  recordAddress(record: InternalIpRecord): Promise<void>;
  listCurrent(hostname?: string): Promise<CurrentInternalIp[]>;
}
