export interface PlayerIdentity {
  readonly team_name: string;
  readonly first_name: string;
  readonly last_name: string;
}

/**
 * Filesystem-safe lowercase identifier: accents folded to ASCII, every run
 * of other characters collapsed to a single underscore.
 */
export function slugify(text: string): string {
  const ascii = text.normalize("NFKD").replace(/[^\x00-\x7f]/g, "");
  const slug = ascii
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return slug || "player";
}

export function teamSlug(identity: PlayerIdentity): string {
  return slugify(identity.team_name);
}

export function playerSlug(identity: PlayerIdentity): string {
  return slugify(`${identity.first_name} ${identity.last_name}`);
}

export function displayName(identity: PlayerIdentity): string {
  return `${identity.first_name} ${identity.last_name}`.trim();
}

/** `{team_slug}_{player_slug}`, shared by report files and rating files. */
export function reportStem(identity: PlayerIdentity): string {
  return `${teamSlug(identity)}_${playerSlug(identity)}`;
}

/**
 * Report file stems to look for, most specific first.
 */
export function candidateReportStems(identity: PlayerIdentity): string[] {
  return [reportStem(identity), playerSlug(identity)];
}

/** "sidney_crosby" -> "Sidney Crosby" */
export function nameFromStem(stem: string): string {
  const words = stem
    .split(/[_-]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
  return words.length > 0 ? words.join(" ") : "unknown";
}
