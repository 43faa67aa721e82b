export const ICON_ERROR_CODES = [
  "INVALID_CONFIG",
  "CONFIG_NOT_FOUND",
  "INVALID_COLOR",
  "SOURCE_NOT_FOUND",
  "INVALID_SVG",
  "CONVERTER_UNAVAILABLE",
  "RASTERIZE_FAILED",
  "ICNS_GENERATE_FAILED",
] as const;

export type IconErrorCode = (typeof ICON_ERROR_CODES)[number];

export const VERIFICATION_STATUSES = ["ok", "missing", "mismatch", "error"] as const;

export type VerificationStatus = (typeof VERIFICATION_STATUSES)[number];

export type IconErrorParams = Record<string, string | number | boolean | null>;
