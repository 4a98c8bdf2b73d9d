/**
 * RenderDebugLogger - Opt-in diagnostics for render calls
 *
 * Enable this to capture the scene and options of each render together with
 * timing and output statistics. The captured scene can be exported back as
 * scene JSON to reproduce an issue.
 */

import { RGB_CHANNELS, type RenderedImage, type RenderOptions, type Scene, type Vector3 } from "@/types";

/**
 * Debug log entry for a single render.
 */
export interface RenderDebugLog {
  timestamp: number;
  scene: Scene;
  options: RenderOptions;
  summary: SceneSummary;
  result?: RenderResultDebugInfo;
}

export interface SceneSummary {
  resolution: string;
  lights: number;
  spheres: number;
  planes: number;
  reflective: number;
}

export interface RenderResultDebugInfo {
  durationMs: number;
  pixels: number;
  /** Mean 8-bit value per channel */
  meanColour: Vector3;
}

function summarize(scene: Scene): SceneSummary {
  const { camera, objects } = scene;
  return {
    resolution: `${camera.screenColumns}x${camera.screenRows}`,
    lights: scene.lights.length,
    spheres: objects.filter((o) => o.shape.type === "sphere").length,
    planes: objects.filter((o) => o.shape.type === "plane").length,
    reflective: objects.filter((o) => o.material.kReflect !== 0).length,
  };
}

function meanColour(image: RenderedImage): Vector3 {
  const pixels = image.width * image.height;
  if (pixels === 0) return { x: 0, y: 0, z: 0 };

  let r = 0;
  let g = 0;
  let b = 0;
  for (let i = 0; i < pixels; i++) {
    const offset = i * RGB_CHANNELS;
    r += image.data[offset] ?? 0;
    g += image.data[offset + 1] ?? 0;
    b += image.data[offset + 2] ?? 0;
  }
  return { x: r / pixels, y: g / pixels, z: b / pixels };
}

function vectorToJson(v: Vector3): [number, number, number] {
  return [v.x, v.y, v.z];
}

class RenderDebugLoggerImpl {
  private enabled = false;
  private logs: RenderDebugLog[] = [];
  private maxLogs = 20;
  private lastLog: RenderDebugLog | null = null;

  enable(): void {
    this.enabled = true;
    console.log("[RENDER DEBUG] Logging enabled. Use RenderDebugLogger.dump() to see logs.");
  }

  disable(): void {
    this.enabled = false;
    console.log("[RENDER DEBUG] Logging disabled.");
  }

  toggle(): void {
    if (this.enabled) {
      this.disable();
    } else {
      this.enable();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Log the scene and options at the start of a render.
   */
  logScene(scene: Scene, options: RenderOptions): void {
    if (!this.enabled) return;

    const log: RenderDebugLog = {
      timestamp: Date.now(),
      scene,
      options,
      summary: summarize(scene),
    };

    this.lastLog = log;
    this.logs.push(log);

    // Keep only the last N logs
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }

    const s = log.summary;
    console.log(
      `[RENDER DEBUG] Captured render #${this.logs.length} - ${s.resolution}, ` +
        `${s.spheres} spheres, ${s.planes} planes (${s.reflective} reflective), ${s.lights} lights, ` +
        `maxBounces=${options.maxBounces}`
    );
  }

  /**
   * Attach the result of the render started by the last logScene call.
   */
  logRender(image: RenderedImage, durationMs: number): void {
    if (!this.enabled || !this.lastLog) return;

    this.lastLog.result = {
      durationMs,
      pixels: image.width * image.height,
      meanColour: meanColour(image),
    };
  }

  /**
   * Dump all logs to console.
   */
  dump(): void {
    console.log("[RENDER DEBUG] Dumping logs...");
    console.log("Total logs:", this.logs.length);

    for (const log of this.logs) {
      console.group(`Log @ ${new Date(log.timestamp).toISOString()}`);
      console.log("Scene:", log.summary);
      console.log("Options:", log.options);
      if (log.result) {
        console.log("Result:", log.result);
      }
      console.groupEnd();
    }
  }

  getLastLog(): RenderDebugLog | null {
    return this.lastLog;
  }

  getAllLogs(): readonly RenderDebugLog[] {
    return this.logs;
  }

  clear(): void {
    this.logs = [];
    this.lastLog = null;
    console.log("[RENDER DEBUG] Logs cleared.");
  }

  /**
   * Export the last logged scene as scene JSON (for reproducing issues).
   */
  exportAsSceneJson(): string | null {
    if (!this.lastLog) {
      return null;
    }

    const { scene } = this.lastLog;
    const document = {
      camera: {
        ...scene.camera,
        position: vectorToJson(scene.camera.position),
        direction: vectorToJson(scene.camera.direction),
      },
      ambientLight: vectorToJson(scene.ambientLight),
      backgroundColour: vectorToJson(scene.backgroundColour),
      lights: scene.lights.map((light) => ({
        colour: vectorToJson(light.colour),
        pos: vectorToJson(light.pos),
      })),
      objects: scene.objects.map(({ shape, material }) => ({
        material: { ...material, colour: vectorToJson(material.colour) },
        shape:
          shape.type === "sphere"
            ? { type: shape.type, centre: vectorToJson(shape.centre), radius: shape.radius }
            : { type: shape.type, point: vectorToJson(shape.point), normal: vectorToJson(shape.normal) },
      })),
    };

    return JSON.stringify(document, null, 2);
  }
}

/**
 * Global debug logger instance.
 */
export const RenderDebugLogger = new RenderDebugLoggerImpl();
