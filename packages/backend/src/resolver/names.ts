const VERSION_MARKER = / v/i;

/** Display name with any version suffix dropped: `"Acme V2"` → `"Acme"`. */
export function baseName(name: string): string {
  const cut = name.search(VERSION_MARKER);
  return (cut === -1 ? name : name.slice(0, cut)).trim();
}

export function slugToWords(slug: string): string {
  return slug.replaceAll('-', ' ');
}

export function titleCase(words: string): string {
  return words
    .split(' ')
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}
