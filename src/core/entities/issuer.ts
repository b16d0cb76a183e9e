/**
 * Reporting issuer as last seen on the portal. Nullable fields are null when
 * the source row did not report them; sinks keep the stored value in that case.
 */
export type IssuerRecord = {
  issuerId: string;
  name: string;
  jurisdiction: string | null;
  type: string | null;
  inDefault: boolean | null;
  activeRestriction: boolean | null;
  firstSeen: Date;
  lastSeen: Date;
};
