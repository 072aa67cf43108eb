import { Router } from 'express';
import { AwardIngestor } from '../../ingestion/award-ingestor';
import { isJobName, JobName } from '../../container';
import { fetchAwardSchema, fetchAwardsSchema } from '../schemas/application-schemas';
import { asyncHandler, sendData, toApplicationResponse } from './route-helpers';

export interface AdminRouteDeps {
  ingestor: AwardIngestor;
  jobs: Record<JobName, () => Promise<unknown>>;
}

export function createAdminRoutes(deps: AdminRouteDeps): Router {
  const router = Router();

  /**
   * POST /admin/jobs/:job - run one sweep now
   */
  router.post('/jobs/:job', asyncHandler(async (req, res) => {
    const job = req.params.job;
    if (!isJobName(job)) {
      res.status(404).json({
        success: false,
        error: { code: 'JOB_NOT_FOUND', message: `Unknown job: ${job}`, correlationId: req.correlationId },
      });
      return;
    }

    // fetch-awards is the only job that takes a window
    const result =
      job === 'fetch-awards'
        ? await deps.ingestor.fetchAwards(fetchAwardsSchema.parse(req.body ?? {}))
        : await deps.jobs[job]();
    sendData(res, { job, result });
  }));

  /**
   * POST /admin/awards/fetch - invite the supplier of one award
   */
  router.post('/awards/fetch', asyncHandler(async (req, res) => {
    const { awardId, supplierId } = fetchAwardSchema.parse(req.body);
    const application = await deps.ingestor.fetchAwardByIdAndSupplier(awardId, supplierId);
    sendData(res, toApplicationResponse(application), 201);
  }));

  return router;
}
