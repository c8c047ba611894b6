import type { Scene } from './Scene.js';
import { type Random, type Ray, Vec3 } from './types.js';

// Lower bound on hit distance so a surface does not re-hit itself
export const SHADOW_ACNE_EPSILON = 0.001;

const WHITE: Vec3 = [1.0, 1.0, 1.0];
const SKY_BLUE: Vec3 = [0.5, 0.7, 1.0];
const BLACK: Vec3 = [0, 0, 0];

export interface TraceStats {
    rays: number;
}

// Vertical white-to-blue gradient on a 0..255 scale
export function skyColor(ray: Ray): Vec3 {
    const unitDirection = Vec3.normalize(ray.direction);
    const t = 0.5 * (unitDirection[1] + 1.0);
    return Vec3.scale(Vec3.lerp(WHITE, SKY_BLUE, t), 255);
}

/**
 * Radiance carried back along `ray`, on a 0..255 scale per channel.
 *
 * `depth` is the number of tracing levels left; it drops by one per
 * scattering event and the ray goes black once it reaches zero.
 */
export function traceRay(
    ray: Ray,
    scene: Scene,
    depth: number,
    random: Random,
    stats?: TraceStats
): Vec3 {
    if (depth <= 0) {
        return BLACK;
    }
    if (stats) {
        stats.rays++;
    }

    const hit = scene.closestHit(ray, SHADOW_ACNE_EPSILON, Infinity);
    if (!hit) {
        return skyColor(ray);
    }

    const scatter = hit.material.scatter(ray, hit, random);
    if (!scatter) {
        return BLACK;
    }

    return Vec3.multiply(
        scatter.attenuation,
        traceRay(scatter.scattered, scene, depth - 1, random, stats)
    );
}
