export { createRng, type Rng } from "./rng.js";
export { afterEach, assert, beforeEach, describe, drainMacrotasks, nextMacrotask, test } from "./nodeTest.js";
