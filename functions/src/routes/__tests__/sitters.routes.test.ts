import { createSittersRouter } from '../sitters';
import { callRoute, createServices } from './helpers/routeHarness';

const ana = {
  firstname: 'Ana',
  lastname: 'Costa',
  gender: 'female',
  email: 'ana@example.com',
  phone: '0707070707',
  address: 'Rua Augusta 10, Lisboa',
};

describe('sitters routes', () => {
  let sittersRouter: ReturnType<typeof createSittersRouter>;

  beforeEach(() => {
    jest.clearAllMocks();
    const services = createServices();
    sittersRouter = createSittersRouter(() => services);
  });

  it('changes only the phone when only the phone is sent', async () => {
    await callRoute(sittersRouter, 'post', '/', { body: ana });

    const res = await callRoute(sittersRouter, 'put', '/:id', {
      params: { id: 'doc-1' },
      body: { phone: '0808080808' },
    });

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({
      status: 'success',
      data: { id: 'doc-1', ...ana, phone: '0808080808' },
      error: null,
    });

    const fetched = await callRoute(sittersRouter, 'get', '/:id', { params: { id: 'doc-1' } });
    expect(fetched.body.data).toEqual({ id: 'doc-1', ...ana, phone: '0808080808' });
  });

  it('rejects a gender outside male, female and other', async () => {
    const res = await callRoute(sittersRouter, 'post', '/', { body: { ...ana, gender: 'robot' } });

    expect(res.statusCode).toBe(400);
    expect(res.body.error.kind).toBe('ValidationError');
    expect(res.body.error.message).toMatch(/^Invalid Sitter: gender: /);
  });

  it('rejects a body that is not an object', async () => {
    await callRoute(sittersRouter, 'post', '/', { body: ana });

    const res = await callRoute(sittersRouter, 'put', '/:id', {
      params: { id: 'doc-1' },
      body: ['phone'],
    });

    expect(res.statusCode).toBe(400);
    expect(res.body.error).toEqual({
      kind: 'ValidationError',
      message: 'Request body must be a JSON object',
    });
  });

  it('lists sitters', async () => {
    await callRoute(sittersRouter, 'post', '/', { body: ana });

    const res = await callRoute(sittersRouter, 'get', '/');

    expect(res.statusCode).toBe(200);
    expect(res.body.data).toEqual([{ id: 'doc-1', ...ana }]);
  });
});
