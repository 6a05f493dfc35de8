/**
 * Heuristic English singular for resource command names ("orders" -> "order").
 * Rules are checked in order; the first that applies wins.
 */
export function singularize(name: string): string {
  if (name.endsWith('ies') && name.length > 3) {
    return `${name.slice(0, -3)}y`;
  }
  if (
    name.endsWith('xes') ||
    name.endsWith('ses') ||
    name.endsWith('ches') ||
    name.endsWith('shes')
  ) {
    return name.slice(0, -2);
  }
  // status, address, analysis
  if (name.endsWith('us') || name.endsWith('ss') || name.endsWith('is')) {
    return name;
  }
  if (name.endsWith('s') && name.length > 1) {
    return name.slice(0, -1);
  }
  return name;
}
