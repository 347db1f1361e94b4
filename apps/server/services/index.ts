export * as cipherService from "./cipherService";
export * as coordsService from "./coordsService";
export * as geometryService from "./geometryService";
export * as toolsService from "./toolsService";
