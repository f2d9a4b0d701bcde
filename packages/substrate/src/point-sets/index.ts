export * from "./generator";
export * from "./layouts";
export { poissonDisk, type PoissonOptions } from "./poisson";
export { PointSet } from "./point-set";
