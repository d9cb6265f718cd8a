export {
  SafeImportRegistry,
  createSafeImportRegistry,
  loadStandardModuleNames,
  standardPackageNames,
  IMPORTS_WITH_SIDE_EFFECTS,
  BINARY_IMPORTS,
  DEFAULT_STDLIB_LIST,
} from './safe-imports.js';
export type { SafeImportRegistryOptions } from './safe-imports.js';
