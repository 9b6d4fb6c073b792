export enum BuildErrorCode {
  UNSUPPORTED_ARCHITECTURE = "UNSUPPORTED_ARCHITECTURE",
  UNSUPPORTED_DISTRIBUTION = "UNSUPPORTED_DISTRIBUTION",
  INSUFFICIENT_PRIVILEGE = "INSUFFICIENT_PRIVILEGE",
  DEPENDENCY_INSTALL_FAILED = "DEPENDENCY_INSTALL_FAILED",
  DOWNLOAD_FAILED = "DOWNLOAD_FAILED",
  EXTRACTION_FAILED = "EXTRACTION_FAILED",
  ICON_EXTRACTION_FAILED = "ICON_EXTRACTION_FAILED",
  REPACK_FAILED = "REPACK_FAILED",
  PACKAGE_BUILD_FAILED = "PACKAGE_BUILD_FAILED",
  CONFIG_INVALID = "CONFIG_INVALID",
  BUILD_IN_PROGRESS = "BUILD_IN_PROGRESS",
}

export class BuildError extends Error {
  readonly code: BuildErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: BuildErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "BuildError";
    this.code = code;
    this.context = context;
  }
}
