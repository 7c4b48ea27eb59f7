import type { SchemaRegistry } from "../schema/registry.js";

const PREFIXES = ["aws ", "amazon "];
const SUFFIXES = [" services", " service", " configuration", " setup", " deployment"];

export function slugifyServiceName(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

function stripAffixes(text: string): string {
  let current = text.trim();
  let changed = true;
  while (changed) {
    changed = false;
    for (const prefix of PREFIXES) {
      if (current.startsWith(prefix)) {
        current = current.slice(prefix.length).trim();
        changed = true;
      }
    }
    for (const suffix of SUFFIXES) {
      if (current.endsWith(suffix)) {
        current = current.slice(0, -suffix.length).trim();
        changed = true;
      }
    }
  }
  return current;
}

/**
 * 候选键按优先级排列：去前后缀的主体、原始主体、括号内文本（如 "(S3)"）。
 */
export function serviceNameCandidates(name: string): string[] {
  const lower = name.trim().toLowerCase();
  const parenthetical = Array.from(lower.matchAll(/\(([^)]*)\)/g), (match) => match[1] ?? "");
  const base = lower.replace(/\([^)]*\)/g, " ").replace(/\s+/g, " ").trim();
  const candidates = [
    slugifyServiceName(stripAffixes(base)),
    slugifyServiceName(base),
    ...parenthetical.map((text) => slugifyServiceName(stripAffixes(text)))
  ];
  return Array.from(new Set(candidates.filter((candidate) => candidate.length > 0)));
}

function containsTokens(candidate: string, key: string): boolean {
  const haystack = candidate.split("_");
  const needle = key.split("_");
  for (let start = 0; start + needle.length <= haystack.length; start++) {
    if (needle.every((token, offset) => haystack[start + offset] === token)) {
      return true;
    }
  }
  return false;
}

/**
 * 将自由文本的服务名归一化为服务类型键：精确键 → 别名 → 唯一的词元包含匹配。
 * 无法识别时返回清洗后的名称，由校验阶段报告 schema_not_found。
 */
export function normalizeServiceName(name: string, registry: SchemaRegistry): string {
  const candidates = serviceNameCandidates(name);

  for (const candidate of candidates) {
    if (registry.has(candidate)) {
      return candidate;
    }
    const aliased = registry.resolveAlias(candidate);
    if (aliased) {
      return aliased;
    }
  }

  const keys: Array<[string, string]> = [
    ...registry.list().map((schema): [string, string] => [schema.serviceType, schema.serviceType]),
    ...registry.aliases()
  ];
  const matches = new Set<string>();
  for (const candidate of candidates) {
    for (const [key, serviceType] of keys) {
      if (containsTokens(candidate, key)) {
        matches.add(serviceType);
      }
    }
  }
  if (matches.size === 1) {
    const [only] = matches;
    if (only) {
      return only;
    }
  }

  return candidates[0] ?? slugifyServiceName(name);
}
