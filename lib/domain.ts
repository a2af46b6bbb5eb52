import { toASCII } from "punycode";
import * as psl from "psl";
import { InsufficientLabelsError, InvalidDomainError, InvalidParentError } from "./errors";
import type { DomainPair } from "./types";

const LABEL_PATTERN = /^[a-z0-9_](?:[a-z0-9_-]{0,61}[a-z0-9_])?$/;
const MAX_HOST_LENGTH = 253;

/**
 * Normalize an input string to a host (ASCII/punycode), lowercase, stripped of protocol/path/port
 * and of leading/trailing dots. Throws InvalidDomainError if it can't be parsed.
 */
export function normalizeDomain(input: string): string {
  const s = input.trim();
  if (!s) throw new InvalidDomainError("Empty domain name");

  // If it's like "example.com/path" or "http://example.com", make sure URL can parse it
  const withScheme = /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//.test(s) ? s : `http://${s}`;
  let hostname: string;
  try {
    hostname = new URL(withScheme).hostname;
  } catch {
    // Fallback: bare host, possibly "example.com:8080/path"
    const m = s.match(/^([^/\s:]+)(?::\d+)?(?:\/.*)?$/);
    if (!m) throw new InvalidDomainError(`Unable to parse "${input}" as a domain name`, { input });
    hostname = m[1];
  }

  let ascii: string;
  try {
    ascii = toASCII(hostname).toLowerCase();
  } catch {
    throw new InvalidDomainError(`Unable to convert "${input}" to ASCII`, { input });
  }
  return ascii.replace(/^\.+|\.+$/g, "");
}

/** Label-level syntax check only; no public suffix lookup. */
export function isValidHostSyntax(host: string): boolean {
  if (!host || host.length > MAX_HOST_LENGTH) return false;
  return host.split(".").every((label) => LABEL_PATTERN.test(label));
}

/**
 * Host validation: syntax plus psl.parse, which only yields a `domain` when
 * the host sits below a public suffix.
 */
export function isValidHost(host: string): boolean {
  if (!host) return false;
  const cleaned = host.trim().toLowerCase();
  if (/\s/.test(cleaned)) return false;
  let ascii: string;
  try {
    ascii = toASCII(cleaned);
  } catch {
    return false;
  }
  if (!isValidHostSyntax(ascii)) return false;

  const parsed = psl.parse(ascii);
  if ("error" in parsed) return false;
  return parsed.domain !== null;
}

export function isPublicSuffix(host: string): boolean {
  const parsed = psl.parse(host);
  if ("error" in parsed) return false;
  return parsed.listed && parsed.domain === null;
}

export function labelCount(host: string): number {
  return host.split(".").length;
}

/** True when `child` sits strictly below `parent` in the DNS tree. */
export function isStrictDescendant(child: string, parent: string): boolean {
  return child.endsWith(`.${parent}`);
}

/**
 * Strip the leftmost label. Needs at least 3 labels, and the remainder must
 * not be a bare public suffix ("example.co.uk" has no registrable parent).
 */
export function inferParentDomain(subdomain: string): string {
  const labels = subdomain.split(".");
  if (labels.length < 3) {
    throw new InsufficientLabelsError(
      `Cannot infer a parent domain for "${subdomain}": it has only ${labels.length} label(s). Pass the parent explicitly.`,
      { subdomain },
    );
  }
  const parent = labels.slice(1).join(".");
  if (isPublicSuffix(parent)) {
    throw new InsufficientLabelsError(
      `Cannot infer a parent domain for "${subdomain}": "${parent}" is a public suffix. Pass the parent explicitly.`,
      { subdomain, parent },
    );
  }
  return parent;
}

/**
 * Produce the validated (subdomain, parent) pair. An explicit parent must be
 * the trailing labels of the subdomain, at least one label shorter.
 */
export function parseDomainPair(subdomainInput: string, parentInput?: string): DomainPair {
  const subdomain = normalizeDomain(subdomainInput);
  const invalid = () =>
    new InvalidDomainError(`"${subdomainInput}" is not a valid host name`, { input: subdomainInput });

  if (parentInput === undefined || parentInput.trim() === "") {
    // Label count is checked before psl, so "localhost" or "com" report too few labels
    if (!isValidHostSyntax(subdomain)) throw invalid();
    const parent = inferParentDomain(subdomain);
    if (!isValidHost(subdomain)) throw invalid();
    return { subdomain, parent };
  }

  if (!isValidHost(subdomain)) throw invalid();

  const parent = normalizeDomain(parentInput);
  if (!isValidHostSyntax(parent)) {
    throw new InvalidDomainError(`"${parentInput}" is not a valid domain name`, { input: parentInput });
  }
  if (!isStrictDescendant(subdomain, parent)) {
    throw new InvalidParentError(`"${parent}" is not a parent domain of "${subdomain}"`, { subdomain, parent });
  }
  return { subdomain, parent };
}
