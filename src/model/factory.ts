import type { AppConfig } from '../config.js';
import { loadCorpus } from '../content/contentLoader.js';
import { InvalidConfigError } from '../utils/errorhandler.js';
import { logger } from '../utils/logger.js';
import type { ModelCollaborator } from './base.js';
import { NgramModel } from './ngramModel.js';
import { RemoteModel } from './remoteModel.js';

export async function createModel(config: AppConfig, fetchImpl?: typeof fetch): Promise<ModelCollaborator> {
  if (config.model.backend === 'remote') {
    if (!config.model.url) {
      throw new InvalidConfigError('modelUrl', 'is required when MODEL_BACKEND is remote', { envVar: 'MODEL_URL' });
    }
    return RemoteModel.connect({ baseUrl: config.model.url, timeoutMs: config.model.timeoutMs, fetchImpl });
  }

  const documents = loadCorpus(config.contentRoot);
  if (documents.length === 0) {
    throw new InvalidConfigError('contentRoot', `no corpus or prompts found under ${config.contentRoot}`, {
      envVar: 'CONTENT_ROOT',
      value: config.contentRoot,
    });
  }
  const model = NgramModel.fromTexts(documents);
  logger.info('Trained local model', { documents: documents.length, vocabSize: model.vocabSize });
  return model;
}
