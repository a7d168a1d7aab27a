/**
 * Final `/`-separated segment of an ARN, e.g.
 * `arn:aws:ecs:us-east-1:123456789012:service/prod/web` -> `web`.
 */
export function shortName(arn: string): string {
  return arn.split("/").pop() ?? arn;
}

/** Short names in plain lexical order. */
export function sortedShortNames(arns: string[]): string[] {
  return arns.map(shortName).sort();
}
