export interface TitleReference {
  name: string;
  reference?: string;
}

/**
 * Split a trailing reference off a title.
 * With pattern `SJC-\d+`, "Commonwealth v. Doe, SJC-13444" gives
 * `{ name: 'Commonwealth v. Doe', reference: 'SJC-13444' }`.
 */
export function parseTitleReference(title: string, pattern?: string): TitleReference {
  if (!pattern) {
    return { name: title };
  }
  const match = new RegExp(`^(.+),\\s*(${pattern})$`).exec(title.trim());
  if (!match) {
    return { name: title };
  }
  return { name: match[1].trim(), reference: match[2] };
}
