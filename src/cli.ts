/**
 * Command-line front end: pick a scene, render it, stream PPM to stdout.
 */

import { Camera } from "./camera";
import { createProgressReporter, PpmWriter, type TextTarget } from "./output";
import { seededRandom } from "./scene/utils";
import { getScene, listScenes } from "./scenes";

export const DEFAULT_SCENE = "spheres";
export const DEFAULT_SEED = 42;

export interface CliOptions {
  scene: string;
  seed?: number;
  samples?: number;
  width?: number;
  quiet: boolean;
}

function parseInteger(flag: string, value: string | undefined): number {
  const n = Number(value);
  if (value === undefined || value.trim() === "" || !Number.isInteger(n)) {
    throw new Error(`${flag} expects an integer, got "${value ?? ""}"`);
  }
  return n;
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { scene: DEFAULT_SCENE, quiet: false };
  let sceneSet = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--seed":
        options.seed = parseInteger(arg, argv[++i]);
        break;
      case "--samples":
        options.samples = parseInteger(arg, argv[++i]);
        break;
      case "--width":
        options.width = parseInteger(arg, argv[++i]);
        break;
      case "--quiet":
        options.quiet = true;
        break;
      default:
        if (arg === undefined || arg.startsWith("--") || sceneSet) {
          throw new Error(`Unexpected argument "${arg ?? ""}"`);
        }
        options.scene = arg;
        sceneSet = true;
    }
  }

  return options;
}

export function usage(): string {
  const names = listScenes()
    .map((s) => `  ${s.name.padEnd(10)} ${s.description}`)
    .join("\n");
  return `Usage: render [scene] [--seed <n>] [--samples <n>] [--width <n>] [--quiet]\n\nScenes:\n${names}\n`;
}

/**
 * Renders the scene named in `argv`. Returns the process exit code.
 * The image goes to `stdout`; progress and errors go to `stderr`.
 */
export function run(argv: string[], stdout: TextTarget, stderr: TextTarget): number {
  try {
    const options = parseArgs(argv);
    const def = getScene(options.scene);
    if (!def) {
      stderr.write(`Unknown scene "${options.scene}"\n\n${usage()}`);
      return 1;
    }

    // Scene layout is always reproducible; sampling is only when a seed is given
    const sceneRng = seededRandom(options.seed ?? DEFAULT_SEED);
    const { world, camera: cameraConfig } = def.build(sceneRng);

    const camera = new Camera(cameraConfig);
    if (options.samples !== undefined) camera.samplesPerPixel = options.samples;
    if (options.width !== undefined) camera.imageWidth = options.width;

    camera.render(world, new PpmWriter(stdout), {
      rng: options.seed !== undefined ? sceneRng : Math.random,
      progress: options.quiet ? undefined : createProgressReporter(stderr),
    });
    return 0;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    stderr.write(`render: ${message}\n`);
    return 1;
  }
}
