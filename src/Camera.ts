import { vec3d } from 'wgpu-matrix';
import { type Ray, Vec3 } from './types.js';

const WORLD_AXES: [Vec3, Vec3, Vec3] = [
    [1, 0, 0],
    [0, 1, 0],
    [0, 0, 1],
];

export interface CameraOrientation {
    lookAt: Vec3;
    up: Vec3;
}

/**
 * Pinhole camera. Maps viewport coordinates (u, v) in [0, 1] to world-space
 * rays leaving the camera origin; (0, 0) is the lower-left viewport corner.
 */
export class Camera {
    readonly origin: Vec3;
    readonly horizontal: Vec3;
    readonly vertical: Vec3;
    readonly lowerLeftCorner: Vec3;

    constructor(
        origin: Vec3,
        viewportHeight: number,
        viewportWidth: number,
        focalLength: number,
        orientation?: CameraOrientation
    ) {
        this.origin = origin;

        // Camera basis: u points right, v up, w backwards (the camera looks down -w)
        const [u, v, w] = orientation
            ? Camera.basis(origin, orientation)
            : WORLD_AXES;

        this.horizontal = Vec3.scale(u, viewportWidth);
        this.vertical = Vec3.scale(v, viewportHeight);
        this.lowerLeftCorner = Vec3.subtract(
            Vec3.subtract(
                Vec3.subtract(origin, Vec3.scale(this.horizontal, 0.5)),
                Vec3.scale(this.vertical, 0.5)
            ),
            Vec3.scale(w, focalLength)
        );
    }

    private static basis(
        origin: Vec3,
        orientation: CameraOrientation
    ): [Vec3, Vec3, Vec3] {
        const forward = Vec3.subtract(origin, orientation.lookAt);
        if (Vec3.nearZero(forward)) {
            throw new Error('Camera lookAt must differ from the camera origin');
        }

        // Float64 variant so the basis keeps full double precision
        const w = vec3d.normalize(vec3d.fromValues(...forward));
        const u = vec3d.normalize(
            vec3d.cross(vec3d.fromValues(...orientation.up), w)
        );
        if (vec3d.lengthSq(u) === 0) {
            throw new Error('Camera up vector must not be parallel to the view direction');
        }
        const v = vec3d.cross(w, u);

        return [
            [u[0], u[1], u[2]],
            [v[0], v[1], v[2]],
            [w[0], w[1], w[2]],
        ];
    }

    getRay(u: number, v: number): Ray {
        const target = Vec3.add(
            Vec3.add(this.lowerLeftCorner, Vec3.scale(this.horizontal, u)),
            Vec3.scale(this.vertical, v)
        );
        return {
            origin: this.origin,
            direction: Vec3.subtract(target, this.origin),
        };
    }
}
