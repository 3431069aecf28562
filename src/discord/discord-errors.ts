/** REST error codes the adapters treat as "absent" rather than as failures. */
export const UNKNOWN_MEMBER = 10007;
export const UNKNOWN_MESSAGE = 10008;
export const UNKNOWN_USER = 10013;

export function errorCode(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('code' in err)) return null;
  const code = err.code;
  return typeof code === 'number' ? code : null;
}

export function isUnknownEntity(err: unknown, ...codes: number[]): boolean {
  const code = errorCode(err);
  return code !== null && codes.includes(code);
}
