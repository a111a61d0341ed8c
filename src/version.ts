export const VERSION_MAJOR = 1;
export const VERSION_MINOR = 0;
export const VERSION_PATCH = 0;

/** Library version as `major.minor.patch`. */
export function version(): string {
  return `${VERSION_MAJOR}.${VERSION_MINOR}.${VERSION_PATCH}`;
}
