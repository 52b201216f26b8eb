/** Operator identity as resolved by the API layer; opaque beyond audit attribution and role. */
export type OperatorRole = "viewer" | "operator" | "admin";

export type OperatorRef = {
  subject: string;
  role: OperatorRole;
};

/** Who is calling an upward-facing operation. `operator` is null for unauthenticated minion handshakes. */
export type Caller = {
  ip: string;
  operator: OperatorRef | null;
};
