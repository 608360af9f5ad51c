import fsp from "node:fs/promises";
import path from "node:path";
import {
  EXTENDED_SUFFIX,
  describeError,
  logger as defaultLogger,
  type Logger,
} from "@rinkscout/scouting";

export const REPORT_SEPARATOR = "\n\n---\n\n";

export const DEFAULT_COMPANION_DIR_NAME = "player_summaries";

/** `x_extended.md` pairs with `x.md` and the other way round. */
export function companionFileName(fileName: string): string {
  const extension = path.extname(fileName);
  const stem = path.basename(fileName, extension);
  if (stem.endsWith(EXTENDED_SUFFIX)) {
    return `${stem.slice(0, -EXTENDED_SUFFIX.length)}${extension}`;
  }
  return `${stem}${EXTENDED_SUFFIX}${extension}`;
}

export function defaultCompanionDir(primaryPath: string): string {
  return path.join(path.dirname(path.dirname(primaryPath)), DEFAULT_COMPANION_DIR_NAME);
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fsp.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Finds the companion report beside the primary first, then in
 * `companionDir`. The primary itself never counts as its own companion.
 */
export async function findCompanionReport(
  primaryPath: string,
  companionDir = defaultCompanionDir(primaryPath)
): Promise<string | undefined> {
  const resolvedPrimary = path.resolve(primaryPath);
  const wantedName = companionFileName(path.basename(primaryPath));
  const candidates = [
    path.join(path.dirname(resolvedPrimary), wantedName),
    path.resolve(companionDir, wantedName),
  ];
  for (const candidate of candidates) {
    if (candidate !== resolvedPrimary && (await isFile(candidate))) {
      return candidate;
    }
  }
  return undefined;
}

/**
 * Reads the primary report and appends its companion after a horizontal
 * rule. An unreadable primary yields an empty document so scorers still run
 * and report low confidence.
 */
export async function loadMergedReport(
  primaryPath: string,
  options: { companionDir?: string; logger?: Logger } = {}
): Promise<string> {
  const log = options.logger ?? defaultLogger;

  let primaryText = "";
  try {
    primaryText = await fsp.readFile(primaryPath, "utf-8");
  } catch (error) {
    log.error(`Failed reading primary summary ${primaryPath}: ${describeError(error)}`);
  }

  const companionPath = await findCompanionReport(primaryPath, options.companionDir);
  if (!companionPath) {
    return primaryText;
  }

  try {
    const companionText = await fsp.readFile(companionPath, "utf-8");
    log.info(
      `Merging summaries: primary='${path.basename(primaryPath)}', companion='${path.basename(companionPath)}'`
    );
    return `${primaryText}${REPORT_SEPARATOR}${companionText}`;
  } catch (error) {
    log.warn(
      `Found companion summary but failed to read ${companionPath}: ${describeError(error)}`
    );
    return primaryText;
  }
}
