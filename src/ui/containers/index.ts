export { area, type AreaConfig, type AreaResult } from "./Area";
