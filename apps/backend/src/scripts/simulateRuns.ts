import { promises as fs } from "fs";
import { dirname, resolve } from "path";
import { generateRunBatch } from "../autopilot/runGenerator";
import type { RunMetadata } from "../autopilot/runTypes";
import { findTrack, findVehicle } from "../drive/catalog";
import { logger } from "../utils/logger";

interface CliOptions {
  runs: number;
  output: string;
  seed?: number;
  trackId?: string;
  vehicleId?: string;
  frameDt?: number;
  label: string;
  description?: string;
}

const DEFAULTS: CliOptions = {
  runs: 10,
  output: "data/runs/runs.jsonl",
  label: "lane_keeper",
  description: "Lane-keeping autopilot baseline",
};

const parseArgs = (): CliOptions => {
  const args = process.argv.slice(2);
  const options: CliOptions = { ...DEFAULTS };
  const requireValue = (flag: string, value: string | undefined) => {
    if (value === undefined || value.startsWith("--")) {
      throw new Error(`Missing value for --${flag}`);
    }
    return value;
  };
  const requireNumber = (flag: string, value: string | undefined) => {
    const parsed = Number.parseFloat(requireValue(flag, value));
    if (!Number.isFinite(parsed)) {
      throw new Error(`--${flag} must be a number`);
    }
    return parsed;
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg === undefined || !arg.startsWith("--")) {
      continue;
    }
    const key = arg.slice(2);
    switch (key) {
      case "runs":
        options.runs = Math.trunc(requireNumber(key, args[i + 1]));
        i += 1;
        break;
      case "output":
        options.output = requireValue(key, args[i + 1]);
        i += 1;
        break;
      case "seed":
        options.seed = Math.trunc(requireNumber(key, args[i + 1]));
        i += 1;
        break;
      case "track":
        options.trackId = requireValue(key, args[i + 1]);
        i += 1;
        break;
      case "vehicle":
        options.vehicleId = requireValue(key, args[i + 1]);
        i += 1;
        break;
      case "dt":
        options.frameDt = requireNumber(key, args[i + 1]);
        i += 1;
        break;
      case "label":
        options.label = requireValue(key, args[i + 1]);
        i += 1;
        break;
      case "description":
        options.description = requireValue(key, args[i + 1]);
        i += 1;
        break;
      default:
        break;
    }
  }

  return options;
};

const writeRuns = async (outputPath: string, lines: string[]) => {
  const resolved = resolve(outputPath);
  await fs.mkdir(dirname(resolved), { recursive: true });
  await fs.writeFile(resolved, `${lines.join("\n")}\n`, "utf8");
};

const main = async () => {
  const options = parseArgs();
  const track = options.trackId === undefined ? undefined : findTrack(options.trackId);
  if (options.trackId !== undefined && !track) {
    throw new Error(`Unknown track ${options.trackId}`);
  }
  const vehicle = options.vehicleId === undefined ? undefined : findVehicle(options.vehicleId);
  if (options.vehicleId !== undefined && !vehicle) {
    throw new Error(`Unknown vehicle ${options.vehicleId}`);
  }

  const metadata: RunMetadata = { label: options.label };
  if (options.description !== undefined) {
    metadata.description = options.description;
  }

  const runs = generateRunBatch({
    runCount: options.runs,
    metadata,
    ...(options.seed !== undefined ? { seed: options.seed } : {}),
    ...(options.frameDt !== undefined ? { frameDt: options.frameDt } : {}),
    ...(track ? { track } : {}),
    ...(vehicle ? { vehicle } : {}),
  });

  await writeRuns(options.output, runs.map((run) => JSON.stringify(run)));
  logger.info(`Simulated ${runs.length} runs to ${resolve(options.output)}`, { label: options.label });
};

if (require.main === module) {
  void main().catch((error: unknown) => {
    logger.error("Run simulation failed", { error: error instanceof Error ? error.message : String(error) });
    process.exitCode = 1;
  });
}
