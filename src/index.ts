#!/usr/bin/env node
import "dotenv/config";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, isAbsolute, join, resolve } from "path";
import { loadConfig } from "./config/loadConfig.js";
import { DEFAULT_MAP_FILE } from "./config/constants.js";
import { runSimulation } from "./app/runSimulation.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const BUNDLED_MAP_PATH = join(__dirname, "..", DEFAULT_MAP_FILE);

const config = loadConfig(process.env);
const mapPath =
  config.mapPath === DEFAULT_MAP_FILE
    ? BUNDLED_MAP_PATH
    : isAbsolute(config.mapPath)
      ? config.mapPath
      : resolve(process.cwd(), config.mapPath);

const mapText = readFileSync(mapPath, "utf-8");
console.log("Map:", mapPath);

const result = await runSimulation({ config, mapText });
console.log("Finished:", { ticks: result.ticks, positions: result.positions });
