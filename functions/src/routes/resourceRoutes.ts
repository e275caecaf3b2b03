import type { Router } from 'express';
import * as functions from 'firebase-functions';
import type { DocumentData } from '../services/repositories/documents/DocumentStore';
import type { ResourceDomainService } from '../services/domain/resources/ResourceDomainService';
import { created, envelopeHandler, ok } from '../utils/apiResponse';

type RegisterResourceRoutesOptions<TFields extends DocumentData> = {
  /** Log prefix and path segment, e.g. "owners". */
  name: string;
  getResourceService: () => ResourceDomainService<TFields>;
};

/**
 * Mounts create/list/read/update/delete on `router`. Every handler returns an
 * Outcome, so each response goes through the envelope builder.
 */
export function registerResourceRoutes<TFields extends DocumentData>(
  router: Router,
  options: RegisterResourceRoutesOptions<TFields>,
): void {
  const { name, getResourceService } = options;

  /**
   * POST /{name}
   */
  router.post(
    '/',
    envelopeHandler(async (req) => {
      const record = await getResourceService().create(req.body);
      functions.logger.info(`[${name}] Created ${record.id}`);
      return created(record);
    }),
  );

  /**
   * GET /{name}
   */
  router.get(
    '/',
    envelopeHandler(async () => {
      const records = await getResourceService().list();
      functions.logger.info(`[${name}] Listed ${records.length} documents`);
      return ok(records);
    }),
  );

  /**
   * GET /{name}/:id
   */
  router.get(
    '/:id',
    envelopeHandler(async (req) => ok(await getResourceService().getById(req.params.id))),
  );

  /**
   * PUT /{name}/:id
   * Sparse update: only the fields present in the body change.
   */
  router.put(
    '/:id',
    envelopeHandler(async (req) => {
      const record = await getResourceService().update(req.params.id, req.body);
      functions.logger.info(`[${name}] Updated ${record.id}`);
      return ok(record);
    }),
  );

  /**
   * DELETE /{name}/:id
   * Does not touch documents that reference the deleted one.
   */
  router.delete(
    '/:id',
    envelopeHandler(async (req) => {
      const ack = await getResourceService().deleteById(req.params.id);
      functions.logger.info(`[${name}] Deleted ${ack.id}`);
      return ok(ack);
    }),
  );
}
