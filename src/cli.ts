#!/usr/bin/env -S npx tsx
/**
 * CLI Entry Point: Render a scene file to PNG
 *
 * Usage:
 *   npm run render
 *   npm run render -- scenes/mirrors.json mirrors.png --max-bounces=4
 *
 * Options:
 *   --max-bounces=N          Reflection bounce ceiling (default: 10)
 *   --shadow-epsilon=X       Minimum shadow ray distance (default: 0.1)
 *   --reflection-epsilon=X   Minimum reflection ray distance (default: 0.0001)
 *   --debug                  Capture and dump render diagnostics
 *   --quiet                  Only report errors
 */

import { existsSync, realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { RenderDebugLogger } from "@/debug/RenderDebugLogger";
import { writePng } from "@/image/PngWriter";
import { renderScene } from "@/render/PixelRenderer";
import { loadSceneFile } from "@/scene/SceneLoader";
import type { RenderOptions } from "@/types";

export interface CliArguments {
  scenePath: string;
  outputPath: string;
  options: Partial<RenderOptions>;
  debug: boolean;
  quiet: boolean;
}

const VALUE_FLAGS = ["max-bounces", "shadow-epsilon", "reflection-epsilon"];
const SWITCH_FLAGS = ["debug", "quiet"];

function isKnownFlag(arg: string): boolean {
  return (
    VALUE_FLAGS.some((name) => arg.startsWith(`--${name}=`)) ||
    SWITCH_FLAGS.some((name) => arg === `--${name}`)
  );
}

function readFlagNumber(args: readonly string[], name: string): number | undefined {
  const raw = args.find((a) => a.startsWith(`--${name}=`))?.split("=")[1];
  if (raw === undefined) return undefined;

  const value = Number(raw);
  if (raw.trim() === "" || Number.isNaN(value)) {
    throw new Error(`--${name} expects a number, got "${raw}"`);
  }
  return value;
}

/**
 * Parse command line arguments (without the node/script prefix).
 */
export function parseArguments(args: readonly string[]): CliArguments {
  const positional = args.filter((a) => !a.startsWith("--"));
  const unknown = args.find((a) => a.startsWith("--") && !isKnownFlag(a));
  if (unknown !== undefined) {
    throw new Error(`Unknown option ${unknown}`);
  }

  const maxBounces = readFlagNumber(args, "max-bounces");
  const shadowEpsilon = readFlagNumber(args, "shadow-epsilon");
  const reflectionEpsilon = readFlagNumber(args, "reflection-epsilon");
  const options: Partial<RenderOptions> = {
    ...(maxBounces !== undefined ? { maxBounces } : {}),
    ...(shadowEpsilon !== undefined ? { shadowEpsilon } : {}),
    ...(reflectionEpsilon !== undefined ? { reflectionEpsilon } : {}),
  };

  return {
    scenePath: positional[0] ?? "scene.json",
    outputPath: positional[1] ?? "output.png",
    options,
    debug: args.includes("--debug"),
    quiet: args.includes("--quiet"),
  };
}

/**
 * Run the renderer. Returns the process exit code.
 */
export function main(args: readonly string[]): number {
  try {
    const cli = parseArguments(args);
    if (cli.debug) {
      RenderDebugLogger.enable();
    }

    const scene = loadSceneFile(cli.scenePath);
    if (!cli.quiet) {
      console.log(
        `[render] ${cli.scenePath}: ${scene.objects.length} objects, ${scene.lights.length} lights, ` +
          `${scene.camera.screenColumns}x${scene.camera.screenRows}`
      );
    }

    const started = performance.now();
    const image = renderScene(scene, cli.options);
    writePng(image, cli.outputPath);

    if (!cli.quiet) {
      console.log(`[render] Wrote ${cli.outputPath} in ${(performance.now() - started).toFixed(0)} ms`);
    }
    if (cli.debug) {
      RenderDebugLogger.dump();
    }
    return 0;
  } catch (err) {
    console.error(`[render] ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}

/**
 * Whether the script path node was started with resolves to this module.
 * An installed bin is a symlink, so both sides are compared by real path.
 */
export function isEntryPoint(entry: string | undefined, moduleUrl: string): boolean {
  if (entry === undefined || !existsSync(entry)) return false;
  return realpathSync(entry) === realpathSync(fileURLToPath(moduleUrl));
}

// Run only when executed directly, not when imported by tests
if (isEntryPoint(process.argv[1], import.meta.url)) {
  process.exitCode = main(process.argv.slice(2));
}
