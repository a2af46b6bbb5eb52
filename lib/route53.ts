// Route 53 assigns delegation sets like ns-123.awsdns-45.com / .net / .org / .co.uk.
// A fixed suffix list is used because .co.uk spans two labels.
const AWSDNS_TLDS = ['com', 'net', 'org', 'co.uk'];

const ROUTE53_PATTERNS: RegExp[] = [
  new RegExp(`\\.awsdns-\\d+\\.(?:${AWSDNS_TLDS.map((t) => t.replace('.', '\\.')).join('|')})$`),
  /\.amazonaws\.com$/,
];

/** Lowercase and drop the trailing root dot. */
export function normalizeNameServer(name: string): string {
  return name.trim().toLowerCase().replace(/\.+$/, '');
}

export function isRoute53NameServer(name: string): boolean {
  const ns = normalizeNameServer(name);
  return ROUTE53_PATTERNS.some((re) => re.test(ns));
}

export function route53NameServers(names: string[]): string[] {
  return names.filter(isRoute53NameServer);
}
