/**
 * Built-in scenes. Importing this module registers all of them.
 */

import "./spheres";
import "./field";

export { registerScene, getScene, listScenes, type SceneDef, type BuiltScene } from "./registry";
export { buildSpheresWorld } from "./spheres";
export { buildFieldWorld } from "./field";
