export { type RotationResult, rotate } from "./rotator";
