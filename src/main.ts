/**
 * Path tracer entry point - renders a built-in scene as PPM on stdout.
 */

import { run } from "./cli";

process.exitCode = run(process.argv.slice(2), process.stdout, process.stderr);
