import { createRenderOptions } from "@/config/renderConfig";
import { RayUtils } from "@/math/Ray";
import {
  ambientTerm,
  isOccluded,
  lightContribution,
  shade,
} from "@/tracer/ShadingEngine";
import type { Intersection, SceneHit } from "@/types";
import {
  createLight,
  createMaterial,
  createObject,
  createPlane,
  createSphere,
  createTestScene,
  v,
} from "@test/helpers/sceneHelpers";
import { describe, expect, it } from "vitest";

describe("ShadingEngine", () => {
  const options = createRenderOptions();

  // Hit on the floor z = 0 at the origin, seen from straight above
  const floor = createObject(createPlane(v(0, 0, 0), v(0, 0, 1)));
  const floorHit: Intersection = { t: 5, pos: v(0, 0, 0), normal: v(0, 0, 1) };
  const viewRay = RayUtils.create(v(0, 0, 5), v(0, 0, -1));

  function hitWith(overrides: Parameters<typeof createMaterial>[0]): SceneHit {
    return { intersection: floorHit, material: createMaterial(overrides) };
  }

  describe("ambientTerm", () => {
    it("should scale the component-wise product of ambient light and colour", () => {
      const scene = createTestScene({ ambientLight: v(0.2, 0.4, 0.6) });
      const term = ambientTerm(scene, createMaterial({ colour: v(1, 0.5, 0.25), kAmbient: 0.5 }));

      expect(term.x).toBeCloseTo(0.1);
      expect(term.y).toBeCloseTo(0.1);
      expect(term.z).toBeCloseTo(0.075);
    });
  });

  describe("isOccluded", () => {
    it("should be false with nothing between the point and the light", () => {
      const scene = createTestScene({ objects: [floor] });
      expect(isOccluded(scene, v(0, 0, 0), createLight(v(0, 0, 10)), options)).toBe(false);
    });

    it("should be true with an object between the point and the light", () => {
      const blocker = createObject(createSphere(v(0, 0, 5), 1));
      const scene = createTestScene({ objects: [floor, blocker] });
      expect(isOccluded(scene, v(0, 0, 0), createLight(v(0, 0, 10)), options)).toBe(true);
    });

    it("should also count an occluder beyond the light", () => {
      const beyond = createObject(createSphere(v(0, 0, 20), 1));
      const scene = createTestScene({ objects: [beyond] });
      expect(isOccluded(scene, v(0, 0, 0), createLight(v(0, 0, 10)), options)).toBe(true);
    });

    it("should ignore hits within the shadow epsilon", () => {
      // Sphere surface 0.05 above the point
      const close = createObject(createSphere(v(0, 0, -0.95), 1));
      const scene = createTestScene({ objects: [close] });
      // Exit root at t = 0.05 is not beyond the 0.1 epsilon
      expect(isOccluded(scene, v(0, 0, 0), createLight(v(0, 0, 10)), options)).toBe(false);
      expect(
        isOccluded(scene, v(0, 0, 0), createLight(v(0, 0, 10)), createRenderOptions({ shadowEpsilon: 0.01 }))
      ).toBe(true);
    });
  });

  describe("lightContribution", () => {
    it("should give full diffuse for a light straight above", () => {
      const material = createMaterial({ colour: v(1, 0.5, 0.25), kDiffuse: 1 });
      const c = lightContribution(floorHit, material, createLight(v(0, 0, 10)), v(0, 0, 1));
      expect(c).toEqual({ x: 1, y: 0.5, z: 0.25 });
    });

    it("should fall off with the cosine of the light angle", () => {
      const material = createMaterial({ kDiffuse: 1 });
      // Light at 60° from the normal → cos = 0.5
      const light = createLight(v(Math.sqrt(3), 0, 1));
      const c = lightContribution(floorHit, material, light, v(0, 0, 1));
      expect(c.x).toBeCloseTo(0.5);
    });

    it("should give no diffuse for a light below the surface", () => {
      const material = createMaterial({ kDiffuse: 1 });
      const c = lightContribution(floorHit, material, createLight(v(0, 0, -10)), v(0, 0, 1));
      expect(c).toEqual({ x: 0, y: 0, z: 0 });
    });

    it("should give a full highlight when the half vector matches the normal", () => {
      const material = createMaterial({ colour: v(1, 0, 0), kSpecular: 1, shine: 10 });
      const c = lightContribution(floorHit, material, createLight(v(0, 0, 10), v(0.5, 0.5, 0.5)), v(0, 0, 1));
      // Specular uses the light colour, not the surface colour
      expect(c).toEqual({ x: 0.5, y: 0.5, z: 0.5 });
    });

    it("should narrow the highlight as shine grows", () => {
      // Light at 90° to the view: half vector at 45° from the normal, cos = √½
      const light = createLight(v(10, 0, 0));
      const dull = lightContribution(floorHit, createMaterial({ kSpecular: 1, shine: 2 }), light, v(0, 0, 1));
      const sharp = lightContribution(floorHit, createMaterial({ kSpecular: 1, shine: 50 }), light, v(0, 0, 1));

      expect(dull.x).toBeCloseTo(0.5);
      expect(sharp.x).toBeLessThan(dull.x);
    });

    it("should give zero highlight when light and view directions cancel", () => {
      const material = createMaterial({ kSpecular: 1, shine: 4 });
      const c = lightContribution(floorHit, material, createLight(v(10, 0, 0)), v(-1, 0, 0));
      expect(c).toEqual({ x: 0, y: 0, z: 0 });
      expect(Number.isFinite(c.x)).toBe(true);
    });
  });

  describe("shade", () => {
    it("should return only the ambient term when every light is occluded", () => {
      const blocker = createObject(createSphere(v(0, 0, 3), 1));
      const scene = createTestScene({
        ambientLight: v(0.2, 0.4, 0.6),
        lights: [createLight(v(0, 0, 10)), createLight(v(1, 0, 10))],
        objects: [floor, blocker],
      });
      const hit = hitWith({ colour: v(1, 0.5, 0.25), kAmbient: 0.5, kDiffuse: 1, kSpecular: 1 });

      const colour = shade(scene, hit, viewRay, options);
      expect(colour.x).toBeCloseTo(0.1);
      expect(colour.y).toBeCloseTo(0.1);
      expect(colour.z).toBeCloseTo(0.075);
    });

    it("should add ambient, diffuse and specular of an unoccluded light", () => {
      const scene = createTestScene({
        ambientLight: v(1, 1, 1),
        lights: [createLight(v(0, 0, 10))],
        objects: [floor],
      });
      const hit = hitWith({ colour: v(0.5, 0.5, 0.5), kAmbient: 0.2, kDiffuse: 1, kSpecular: 0.3 });

      // 0.2·0.5 + 1·0.5 + 0.3·1
      const colour = shade(scene, hit, viewRay, options);
      expect(colour.x).toBeCloseTo(0.9);
      expect(colour.y).toBeCloseTo(0.9);
      expect(colour.z).toBeCloseTo(0.9);
    });

    it("should sum the contributions of several lights and may exceed 1", () => {
      const scene = createTestScene({
        lights: [createLight(v(0, 0, 10)), createLight(v(0, 0, 20)), createLight(v(0, 0, 30))],
        objects: [floor],
      });
      const colour = shade(scene, hitWith({ kDiffuse: 1 }), viewRay, options);
      expect(colour).toEqual({ x: 3, y: 3, z: 3 });
    });

    it("should drop only the occluded light", () => {
      const blocker = createObject(createSphere(v(0, 0, 3), 1));
      const scene = createTestScene({
        lights: [createLight(v(0, 0, 10), v(1, 0, 0)), createLight(v(10, 0, 10), v(0, 1, 0))],
        objects: [floor, blocker],
      });
      const colour = shade(scene, hitWith({ kDiffuse: 1 }), viewRay, options);

      expect(colour.x).toBe(0);
      // Second light at 45°
      expect(colour.y).toBeCloseTo(Math.SQRT1_2);
    });
  });
});
