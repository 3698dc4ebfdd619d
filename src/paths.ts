import { fileURLToPath } from "node:url";
import { join } from "node:path";

export const PROJECT_ROOT = fileURLToPath(new URL("..", import.meta.url));
export const CONFIG_DIR = join(PROJECT_ROOT, "config");

export const DEFAULT_CONVERSION_MAP_PATH = join(CONFIG_DIR, "conversion-map.json");
export const DEFAULT_ROLLER_MAPPING_PATHS = [
  join(CONFIG_DIR, "roller-mappings.json"),
  join(CONFIG_DIR, "roller-mapping.json"),
];
