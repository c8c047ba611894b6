import type { HitRecord, Hittable, Ray } from './types.js';

export class Scene {
    private readonly hittables: Hittable[] = [];

    constructor(objects: Hittable[] = []) {
        for (const object of objects) {
            this.add(object);
        }
    }

    add(object: Hittable): void {
        this.hittables.push(object);
    }

    get objects(): readonly Hittable[] {
        return this.hittables;
    }

    // Linear scan; every accepted hit tightens the upper bound for the rest
    closestHit(ray: Ray, tMin: number, tMax: number): HitRecord | null {
        let closestSoFar = tMax;
        let closest: HitRecord | null = null;

        for (const object of this.hittables) {
            const hit = object.hit(ray, tMin, closestSoFar);
            if (hit) {
                closestSoFar = hit.t;
                closest = hit;
            }
        }

        return closest;
    }
}
