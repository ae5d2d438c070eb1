/**
 * normalises a principal identifier
 * email addresses are compared case-insensitively, any other identifier such as
 * an oidc subject is kept as issued since it is case-sensitive
 * @param principal raw principal identifier
 * @returns trimmed identifier, lower-cased when it is an email address
 * @throws {TypeError} when nothing is left after trimming
 */
export function normalizePrincipal(principal: string): string {
  const trimmed = principal.trim();

  if (!trimmed) {
    throw new TypeError('principal identifier must not be empty');
  }

  return trimmed.includes('@') ? trimmed.toLowerCase() : trimmed;
}
