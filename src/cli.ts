import { fileURLToPath } from 'url';
import * as Common from './common.js';
import { Renderer } from './Renderer.js';

export const DEFAULT_SCENE_PATH = fileURLToPath(
    new URL('../scenes/default.json', import.meta.url)
);
export const DEFAULT_OUTPUT_PATH = 'output.ppm';

// Usage: raytrace [scenePath] [outputPath]
export async function main(args: string[]): Promise<void> {
    const [scenePath = DEFAULT_SCENE_PATH, outputPath = DEFAULT_OUTPUT_PATH] =
        args;

    const { scene, camera, settings, random } = Common.buildScene(
        await Common.loadScene(scenePath)
    );

    const renderer = new Renderer(scene, camera, settings, { random });
    const image = renderer.render();

    await Common.writeImage(outputPath, image);
}

// Any failure is reported and turns into exit code 1
export async function runCli(args: string[]): Promise<void> {
    try {
        await main(args);
    } catch (error) {
        Common.reportError(error);
        process.exitCode = 1;
    }
}
