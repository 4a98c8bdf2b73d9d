/**
 * SceneLoader - Reads a JSON scene document into the immutable Scene model.
 *
 * Layout: camelCase keys, vectors as [x, y, z] arrays, shapes tagged by
 * "type" ("sphere" | "plane"). `backgroundColour` defaults to black and
 * `kReflect` to 0. Validation stops at the first bad value and reports its
 * path, e.g. "objects[2].shape.radius".
 */

import { readFileSync } from "node:fs";
import { Vec3 } from "@/math/Vec3";
import type {
  Camera,
  LightSource,
  Material,
  Scene,
  SceneObject,
  Shape,
  ShapeType,
  Vector3,
} from "@/types";

const SHAPE_TYPES: readonly ShapeType[] = ["sphere", "plane"];

type JsonObject = { readonly [key: string]: unknown };

function fail(path: string, expectation: string): never {
  throw new Error(`Invalid scene: ${path} must be ${expectation}`);
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readObject(value: unknown, path: string): JsonObject {
  if (!isObject(value)) fail(path, "an object");
  return value;
}

function readNumber(value: unknown, path: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) fail(path, "a finite number");
  return value;
}

function readPositiveNumber(value: unknown, path: string): number {
  const n = readNumber(value, path);
  if (n <= 0) fail(path, "a positive number");
  return n;
}

function readPositiveInteger(value: unknown, path: string): number {
  const n = readNumber(value, path);
  if (!Number.isInteger(n) || n <= 0) fail(path, "a positive integer");
  return n;
}

function readVector(value: unknown, path: string): Vector3 {
  if (!Array.isArray(value) || value.length !== 3) fail(path, "an array of 3 numbers");
  const components: readonly unknown[] = value;
  return Vec3.create(
    readNumber(components[0], `${path}[0]`),
    readNumber(components[1], `${path}[1]`),
    readNumber(components[2], `${path}[2]`)
  );
}

function readArray(value: unknown, path: string): readonly unknown[] {
  if (!Array.isArray(value)) fail(path, "an array");
  return value;
}

function readCamera(value: unknown, path: string): Camera {
  const camera = readObject(value, path);
  return {
    position: readVector(camera.position, `${path}.position`),
    direction: readVector(camera.direction, `${path}.direction`),
    screenDistance: readPositiveNumber(camera.screenDistance, `${path}.screenDistance`),
    screenWidth: readPositiveNumber(camera.screenWidth, `${path}.screenWidth`),
    screenHeight: readPositiveNumber(camera.screenHeight, `${path}.screenHeight`),
    screenColumns: readPositiveInteger(camera.screenColumns, `${path}.screenColumns`),
    screenRows: readPositiveInteger(camera.screenRows, `${path}.screenRows`),
  };
}

function readLight(value: unknown, path: string): LightSource {
  const light = readObject(value, path);
  return {
    colour: readVector(light.colour, `${path}.colour`),
    pos: readVector(light.pos, `${path}.pos`),
  };
}

function readMaterial(value: unknown, path: string): Material {
  const material = readObject(value, path);
  const shine = readNumber(material.shine, `${path}.shine`);
  if (shine < 0) fail(`${path}.shine`, "a non-negative number");

  return {
    colour: readVector(material.colour, `${path}.colour`),
    kAmbient: readNumber(material.kAmbient, `${path}.kAmbient`),
    kDiffuse: readNumber(material.kDiffuse, `${path}.kDiffuse`),
    kSpecular: readNumber(material.kSpecular, `${path}.kSpecular`),
    kReflect:
      material.kReflect === undefined ? 0 : readNumber(material.kReflect, `${path}.kReflect`),
    shine,
  };
}

function isShapeType(value: unknown): value is ShapeType {
  return SHAPE_TYPES.some((type) => type === value);
}

function readShape(value: unknown, path: string): Shape {
  const shape = readObject(value, path);
  const type = shape.type;
  if (!isShapeType(type)) fail(`${path}.type`, `one of ${SHAPE_TYPES.join(", ")}`);

  switch (type) {
    case "sphere":
      return {
        type,
        centre: readVector(shape.centre, `${path}.centre`),
        radius: readPositiveNumber(shape.radius, `${path}.radius`),
      };
    case "plane": {
      const normal = readVector(shape.normal, `${path}.normal`);
      if (Vec3.isZero(normal)) fail(`${path}.normal`, "a non-zero vector");
      return {
        type,
        point: readVector(shape.point, `${path}.point`),
        normal: Vec3.normalize(normal),
      };
    }
  }
}

function readSceneObject(value: unknown, path: string): SceneObject {
  const object = readObject(value, path);
  return {
    shape: readShape(object.shape, `${path}.shape`),
    material: readMaterial(object.material, `${path}.material`),
  };
}

/**
 * Validate a parsed JSON document and build the Scene.
 * Throws an Error naming the first invalid field.
 */
export function parseScene(document: unknown): Scene {
  const root = readObject(document, "scene");

  return {
    camera: readCamera(root.camera, "camera"),
    ambientLight: readVector(root.ambientLight, "ambientLight"),
    backgroundColour:
      root.backgroundColour === undefined
        ? Vec3.zero()
        : readVector(root.backgroundColour, "backgroundColour"),
    lights: readArray(root.lights, "lights").map((light, i) => readLight(light, `lights[${i}]`)),
    objects: readArray(root.objects, "objects").map((object, i) =>
      readSceneObject(object, `objects[${i}]`)
    ),
  };
}

/**
 * Parse scene JSON text.
 */
export function parseSceneJson(text: string, source = "scene"): Scene {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to parse ${source}: ${reason}`);
  }
  return parseScene(document);
}

/**
 * Read and validate a scene file.
 */
export function loadSceneFile(path: string): Scene {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to read scene file ${path}: ${reason}`);
  }
  return parseSceneJson(text, path);
}
