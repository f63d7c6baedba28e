import { keccak256, toUtf8Bytes } from "ethers";

function sortedJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(sortedJson).join(",")}]`;
  }
  if (typeof value === "object" && value !== null) {
    const fields = Object.entries(value)
      .filter(([, field]) => field !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, field]) => `${JSON.stringify(key)}:${sortedJson(field)}`);
    return `{${fields.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

/**
 * Next link of a game record's hash chain: keccak256 of the previous link
 * followed by `entry` as JSON with sorted keys. The first link (prev null)
 * covers the game setup on its own.
 */
export function linkHash(prev: string | null, entry: unknown): string {
  return keccak256(toUtf8Bytes((prev ?? "") + sortedJson(entry)));
}
