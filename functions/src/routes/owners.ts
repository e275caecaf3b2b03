import { Router } from 'express';
import type { DomainServiceContainer } from '../services/domain/serviceContainer';
import { registerResourceRoutes } from './resourceRoutes';

/**
 * /owners: no foreign keys. Deleting an owner leaves its dogs and bookings
 * in place.
 */
export function createOwnersRouter(getServices: () => DomainServiceContainer): Router {
  const router = Router();
  registerResourceRoutes(router, {
    name: 'owners',
    getResourceService: () => getServices().ownerService,
  });
  return router;
}
