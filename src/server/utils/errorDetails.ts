// Narrowing helpers for errors thrown by fs and nodemailer (both attach extra fields to Error).

export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function errorResponseCode(err: unknown): number | undefined {
  if (err instanceof Error && 'responseCode' in err && typeof err.responseCode === 'number') {
    return err.responseCode;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
}
