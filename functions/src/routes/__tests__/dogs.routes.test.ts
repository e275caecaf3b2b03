import { createDogsRouter } from '../dogs';
import { callRoute, createServices } from './helpers/routeHarness';

describe('dogs routes', () => {
  let services: ReturnType<typeof createServices>;
  let dogsRouter: ReturnType<typeof createDogsRouter>;
  let ownerId: string;

  beforeEach(async () => {
    jest.clearAllMocks();
    services = createServices();
    dogsRouter = createDogsRouter(() => services);
    ownerId = (
      await services.ownerService.create({
        name: 'maria',
        email: 'maria@example.com',
        phone: '5550100',
        address: 'Calle Mayor 1',
      })
    ).id;
  });

  it('creates a dog for an existing owner', async () => {
    const res = await callRoute(dogsRouter, 'post', '/', {
      body: { owner: ownerId, name: 'Bolt', age: 3 },
    });

    expect(res.statusCode).toBe(201);
    expect(res.body.data).toEqual({ id: 'doc-2', owner: 'doc-1', name: 'Bolt', age: 3, breed: null });
  });

  it('rejects a dog whose owner does not exist and stores nothing', async () => {
    const res = await callRoute(dogsRouter, 'post', '/', {
      body: { owner: 'ghost', name: 'Bolt' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({
      status: 'error',
      data: null,
      error: { kind: 'ReferenceError', message: 'owner references a missing document: "ghost"' },
    });

    const listed = await callRoute(dogsRouter, 'get', '/');
    expect(listed.body.data).toEqual([]);
  });

  it('rejects an age above the limit', async () => {
    const res = await callRoute(dogsRouter, 'post', '/', {
      body: { owner: ownerId, name: 'Bolt', age: 256 },
    });

    expect(res.statusCode).toBe(400);
    expect(res.body.error).toEqual({
      kind: 'ValidationError',
      message: 'Invalid Dog: age: Number must be less than or equal to 255',
    });
  });

  it('rejects an empty owner on update and leaves the dog unchanged', async () => {
    const createdDog = await callRoute(dogsRouter, 'post', '/', {
      body: { owner: ownerId, name: 'Bolt', breed: 'Beagle' },
    });
    const dogId: string = createdDog.body.data.id;

    const res = await callRoute(dogsRouter, 'put', '/:id', {
      params: { id: dogId },
      body: { owner: '' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.body.error).toEqual({
      kind: 'ValidationError',
      message: 'Invalid Dog update: owner: Reference must not be empty',
    });

    const fetched = await callRoute(dogsRouter, 'get', '/:id', { params: { id: dogId } });
    expect(fetched.body.data).toEqual(createdDog.body.data);
  });

  it('clears the breed when it is set to null', async () => {
    await callRoute(dogsRouter, 'post', '/', {
      body: { owner: ownerId, name: 'Bolt', breed: 'Beagle' },
    });

    const res = await callRoute(dogsRouter, 'put', '/:id', {
      params: { id: 'doc-2' },
      body: { breed: null },
    });

    expect(res.statusCode).toBe(200);
    expect(res.body.data).toEqual({ id: 'doc-2', owner: ownerId, name: 'Bolt', age: null, breed: null });
  });

  it('answers 200 with the stored dog for an empty update', async () => {
    await callRoute(dogsRouter, 'post', '/', { body: { owner: ownerId, name: 'Bolt' } });

    const res = await callRoute(dogsRouter, 'put', '/:id', { params: { id: 'doc-2' }, body: {} });

    expect(res.statusCode).toBe(200);
    expect(res.body.data).toEqual({ id: 'doc-2', owner: ownerId, name: 'Bolt', age: null, breed: null });
  });

  it('answers 404 when updating a dog that does not exist', async () => {
    const res = await callRoute(dogsRouter, 'put', '/:id', {
      params: { id: 'ghost' },
      body: { name: 'Rex' },
    });

    expect(res.statusCode).toBe(404);
    expect(res.body.error).toEqual({ kind: 'NotFoundError', message: 'Dog not found' });
  });
});
