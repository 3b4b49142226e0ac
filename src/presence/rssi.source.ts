export type RssiSample =
  | { kind: "reading"; dbm: number }
  | { kind: "unavailable"; reason: string };

export interface RssiSource {
  readonly name: string;
  /** Never rejects: failures come back as an `unavailable` sample. */
  sample(address: string): Promise<RssiSample>;
  close?(): void;
}

export function reading(dbm: number): RssiSample {
  return { kind: "reading", dbm };
}

export function unavailable(reason: string): RssiSample {
  return { kind: "unavailable", reason };
}
