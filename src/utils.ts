import { BigNumber, utils } from "ethers";
import { promises as fs } from "fs";
import path from "path";
import { DateTime } from "luxon";

export const ETHER_DECIMALS = 18;

export const delay = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export const nowIso = (): string => new Date().toISOString();

export const unixToIso = (seconds: number): string =>
  new Date(seconds * 1000).toISOString();

export const hoursToMs = (hours: number): number => hours * 60 * 60 * 1000;

export const daysToMs = (days: number): number => hoursToMs(days * 24);

/**
 * Parses an ether-denominated decimal string into wei. Throws on anything
 * that is not a plain decimal with at most 18 fractional digits.
 */
export const parseDecimal = (value: string): BigNumber =>
  utils.parseUnits(value.trim(), ETHER_DECIMALS);

export const formatDecimal = (value: BigNumber): string =>
  utils.formatUnits(value, ETHER_DECIMALS);

export const ensureDirectory = async (dirPath: string): Promise<void> => {
  await fs.mkdir(dirPath, { recursive: true });
};

const hasErrorCode = (error: unknown, code: string): boolean =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  error.code === code;

export const readJsonFile = async (
  filePath: string,
): Promise<unknown | undefined> => {
  try {
    const raw = await fs.readFile(filePath, "utf8");
    return JSON.parse(raw);
  } catch (error: unknown) {
    if (hasErrorCode(error, "ENOENT")) {
      return undefined;
    }
    throw error;
  }
};

export const writeJsonFile = async <T>(
  filePath: string,
  data: T,
): Promise<void> => {
  await ensureDirectory(path.dirname(filePath));
  const serialized = JSON.stringify(data, null, 2);
  const tempPath = `${filePath}.tmp`;
  await fs.writeFile(tempPath, `${serialized}\n`, "utf8");
  await fs.rename(tempPath, filePath);
};

export const toLowerAddress = (address: string): string =>
  address.trim().toLowerCase();

export const shortenAddress = (address: string): string =>
  address.length > 12 ? `${address.slice(0, 6)}...${address.slice(-4)}` : address;

export const formatUtcTime = (iso: string): string => {
  const dt = DateTime.fromISO(iso, { zone: "utc" });
  return dt.isValid ? `${dt.toFormat("yyyy-MM-dd HH:mm:ss")} UTC` : iso;
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
