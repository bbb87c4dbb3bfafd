/** Directory part of a repo-relative path; '' for root files. */
export function dirOf(path: string): string {
  const idx = path.lastIndexOf('/');
  return idx === -1 ? '' : path.slice(0, idx);
}

/** Places `name` beside `path`. */
export function sibling(path: string, name: string): string {
  const dir = dirOf(path);
  return dir ? `${dir}/${name}` : name;
}

/** Service name as a metric-name prefix: `checkout-api` → `checkout_api`. */
export function metricPrefix(service: string): string {
  const cleaned = service.replace(/[^A-Za-z0-9_]/g, '_');
  return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned;
}
