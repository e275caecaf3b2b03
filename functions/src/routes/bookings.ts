import { Router } from 'express';
import type { DomainServiceContainer } from '../services/domain/serviceContainer';
import { registerResourceRoutes } from './resourceRoutes';

/**
 * /bookings: `owner` is checked the same way as for dogs. `start_time` is stored in UTC.
 */
export function createBookingsRouter(getServices: () => DomainServiceContainer): Router {
  const router = Router();
  registerResourceRoutes(router, {
    name: 'bookings',
    getResourceService: () => getServices().bookingService,
  });
  return router;
}
