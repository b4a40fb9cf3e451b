import path from "node:path";
import { fileURLToPath } from "node:url";

// src/config and dist/config both sit two levels below the package root
const packageRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..");

export const dataRoot = path.join(packageRoot, "data");
export const stopwordsPath = path.join(dataRoot, "stopwords.json");
