import { Router } from 'express';
import type { DomainServiceContainer } from '../services/domain/serviceContainer';
import { registerResourceRoutes } from './resourceRoutes';

export function createSittersRouter(getServices: () => DomainServiceContainer): Router {
  const router = Router();
  registerResourceRoutes(router, {
    name: 'sitters',
    getResourceService: () => getServices().sitterService,
  });
  return router;
}
