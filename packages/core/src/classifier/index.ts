export { ExtensionClassifier, extensionOf, splitExtension } from './extension-classifier';
export type { ClassifierOptions, ExtensionConflict } from './extension-classifier';
