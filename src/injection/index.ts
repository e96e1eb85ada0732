export { PropertyId } from "./decorator";
export { DynamicPropertyInjector } from "./injector";

export type { PropertyIdMetadata } from "./decorator";
