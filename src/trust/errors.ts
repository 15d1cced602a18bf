/**
 * Trust-registry error types. Raised for malformed requests against the
 * registry itself (unknown device, illegal transition, unreadable state
 * file); trust *failures* during a governed action use GovernanceError.
 */

export type TrustRegistryErrorCode =
  | "INVALID_KEY_VERSION"
  | "DEVICE_NOT_FOUND"
  | "INVALID_TRANSITION"
  | "STATE_FILE_INVALID";

export class TrustRegistryError extends Error {
  public readonly code: TrustRegistryErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: TrustRegistryErrorCode,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "TrustRegistryError";
    this.code = code;
    this.details = details ?? {};
  }
}
