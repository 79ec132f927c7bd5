import type { AssistantConfig } from '../../config.js';
import type { ClassifierProvider } from './interface.js';
import { HttpClassifier } from './http-classifier.js';

export type { ClassifierProvider, ClassifierConfig } from './interface.js';

export function createClassifierProvider(config: AssistantConfig): ClassifierProvider {
  return new HttpClassifier({ ...config.classifier });
}
