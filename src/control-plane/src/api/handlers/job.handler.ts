/**
 * Job API handlers
 */

import type { Request, Response, NextFunction } from 'express';
import { ListJobsQuerySchema } from '../../models/job.model.js';
import type { JobOrchestrator } from '../../services/job-orchestrator.js';
import { presentJob, presentTask } from './presenters.js';
import { requireParam, sendData } from './respond.js';

export class JobHandler {
  constructor(private readonly orchestrator: JobOrchestrator) {}

  /**
   * POST /jobs - Admit, charge and dispatch a job
   *
   * Admission failures answer 422 with the violated rule. A job the
   * provider throttled answers 503 but is already charged and queued.
   */
  async create(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const job = await this.orchestrator.create(req.body);
      sendData(req, res, 201, { job: presentJob(job) });
    } catch (error) {
      next(error);
    }
  }

  async get(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { job, tasks } = await this.orchestrator.getJob(requireParam(req, 'jobId'));
      sendData(req, res, 200, { job: presentJob(job), tasks: tasks.map(presentTask) });
    } catch (error) {
      next(error);
    }
  }

  async list(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const query = ListJobsQuerySchema.parse(req.query);
      const jobs = await this.orchestrator.listJobs(query.accountId, query.limit);
      sendData(req, res, 200, { items: jobs.map(presentJob), count: jobs.length });
    } catch (error) {
      next(error);
    }
  }
}
