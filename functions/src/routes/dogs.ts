import { Router } from 'express';
import type { DomainServiceContainer } from '../services/domain/serviceContainer';
import { registerResourceRoutes } from './resourceRoutes';

/**
 * /dogs: `owner` must name an existing owner on create and whenever an
 * update sets it.
 */
export function createDogsRouter(getServices: () => DomainServiceContainer): Router {
  const router = Router();
  registerResourceRoutes(router, {
    name: 'dogs',
    getResourceService: () => getServices().dogService,
  });
  return router;
}
