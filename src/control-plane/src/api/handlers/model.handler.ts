import type { Request, Response } from 'express';
import type { ModelCatalog } from '../../services/model-catalog.js';
import { presentModel } from './presenters.js';
import { sendData } from './respond.js';

export class ModelHandler {
  constructor(private readonly catalog: ModelCatalog) {}

  list(req: Request, res: Response): void {
    const models = this.catalog.list().map(presentModel);
    sendData(req, res, 200, { items: models, count: models.length });
  }
}
