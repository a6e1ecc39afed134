const MAX_SLUG_LENGTH = 80;

export function slugify(value: string) {
  const slug = value
    .toLowerCase()
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .trim()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .replace(/-{2,}/g, "-");

  if (slug.length === 0) {
    return "group";
  }

  return slug.slice(0, MAX_SLUG_LENGTH).replace(/-+$/g, "");
}

// attempt 0 keeps the base; later attempts append -2, -3, ...
export function suffixSlug(base: string, attempt: number) {
  if (attempt === 0) {
    return base;
  }

  const suffix = `-${attempt + 1}`;
  const maxBaseLength = Math.max(2, MAX_SLUG_LENGTH - suffix.length);
  const trimmedBase = base.slice(0, maxBaseLength).replace(/-+$/g, "");
  return `${trimmedBase}${suffix}`;
}

export function isDuplicateSlugError(error: unknown) {
  const message = error instanceof Error ? error.message : "";
  return message.includes("duplicate") || message.includes("groups_slug_key");
}
