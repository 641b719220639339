import fs from "node:fs";
import { errnoOf } from "../ssh/config/errors.js";

export function readJsonIfExistsSync(filePath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    const code = errnoOf(err);
    if (code === "ENOENT" || code === "ENOTDIR") return null;
    throw err;
  }
  return JSON.parse(raw);
}
