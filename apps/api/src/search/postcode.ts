/**
 * Splits "SW1A 1AA" into its outward and inward codes. Anything that is not
 * exactly two space-separated parts yields undefined.
 */
export function splitPostcode(postcode: string): [outward: string, inward: string] | undefined {
  const parts = postcode.split(' ');
  if (parts.length !== 2) return undefined;
  const [outward, inward] = parts;
  if (!outward || !inward) return undefined;
  return [outward, inward];
}
