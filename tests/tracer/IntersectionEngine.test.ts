import { RayUtils } from "@/math/Ray";
import { findNearestHit, hitsAnything } from "@/tracer/IntersectionEngine";
import {
  createObject,
  createPlane,
  createSphere,
  v,
} from "@test/helpers/sceneHelpers";
import { describe, expect, it } from "vitest";

describe("IntersectionEngine", () => {
  // Ray from z = 10 straight down the z axis
  const downRay = RayUtils.create(v(0, 0, 10), v(0, 0, -1));

  const nearSphere = createObject(createSphere(v(0, 0, 4), 1), { colour: v(1, 0, 0) });
  const farSphere = createObject(createSphere(v(0, 0, 0), 1), { colour: v(0, 1, 0) });
  const floor = createObject(createPlane(v(0, 0, -2), v(0, 0, 1)), { colour: v(0, 0, 1) });

  describe("findNearestHit", () => {
    it("should return null for an empty scene", () => {
      expect(findNearestHit([], downRay, 0)).toBeNull();
    });

    it("should return null when no object is hit", () => {
      const sideways = RayUtils.create(v(0, 0, 10), v(1, 0, 0));
      expect(findNearestHit([nearSphere, farSphere], sideways, 0)).toBeNull();
    });

    it("should return the nearest hit regardless of object order", () => {
      for (const objects of [
        [farSphere, floor, nearSphere],
        [nearSphere, farSphere, floor],
        [floor, nearSphere, farSphere],
      ]) {
        const hit = findNearestHit(objects, downRay, 0);
        expect(hit?.intersection.t).toBeCloseTo(5);
        expect(hit?.material).toBe(nearSphere.material);
      }
    });

    it("should skip objects closer than the minimum distance", () => {
      // Near sphere spans t in [5, 7], far sphere [9, 11], floor at t = 12
      expect(findNearestHit([nearSphere, farSphere, floor], downRay, 8)?.material).toBe(
        farSphere.material
      );
      expect(findNearestHit([nearSphere, farSphere, floor], downRay, 11.5)?.material).toBe(
        floor.material
      );
    });

    it("should keep the first object on an exact tie", () => {
      const first = createObject(createPlane(v(0, 0, 0), v(0, 0, 1)), { kAmbient: 1 });
      const second = createObject(createPlane(v(0, 0, 0), v(0, 0, 1)), { kAmbient: 2 });

      expect(findNearestHit([first, second], downRay, 0)?.material.kAmbient).toBe(1);
      expect(findNearestHit([second, first], downRay, 0)?.material.kAmbient).toBe(2);
    });
  });

  describe("hitsAnything", () => {
    it("should report whether any object is hit beyond the minimum distance", () => {
      expect(hitsAnything([farSphere], downRay, 0)).toBe(true);
      expect(hitsAnything([farSphere], downRay, 11)).toBe(false);
      expect(hitsAnything([], downRay, 0)).toBe(false);
    });
  });
});
