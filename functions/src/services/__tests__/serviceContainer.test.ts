import * as admin from 'firebase-admin';
import {
  createDomainServiceContainer,
  getDefaultDocumentStore,
  getDefaultDomainServices,
} from '../domain/serviceContainer';
import { ValidationError } from '../errors';
import { InMemoryDocumentStore } from '../repositories/documents/InMemoryDocumentStore';

describe('createDomainServiceContainer', () => {
  it('builds one service per collection on the shared store', async () => {
    const documentStore = new InMemoryDocumentStore(() => 'owner-1');
    const container = createDomainServiceContainer({ documentStore });

    expect(container.documentStore).toBe(documentStore);
    expect(
      [container.ownerService, container.dogService, container.sitterService, container.bookingService].map(
        (service) => service.label,
      ),
    ).toEqual(['Owner', 'Dog', 'Sitter', 'Booking']);

    await container.ownerService.create({
      name: 'maria',
      email: 'maria@example.com',
      phone: '5550100',
      address: 'Calle Mayor 1',
    });
    await expect(documentStore.get('owners', 'owner-1')).resolves.not.toBeNull();
  });

  it('passes the blank reference policy to every service', async () => {
    const documentStore = new InMemoryDocumentStore(() => 'doc');
    const lenient = createDomainServiceContainer({ documentStore, blankReferencePolicy: 'ignore' });
    const strict = createDomainServiceContainer({ documentStore });
    await documentStore.insert('bookings', {
      owner: 'owner-1',
      start_time: '2026-02-10T08:00:00.000Z',
      duration_minutes: 30,
      cancelled: false,
    });

    await expect(lenient.bookingService.update('doc', { owner: ' ' })).resolves.toMatchObject({
      owner: 'owner-1',
    });
    await expect(strict.bookingService.update('doc', { owner: ' ' })).rejects.toBeInstanceOf(
      ValidationError,
    );
  });
});

describe('default services', () => {
  it('use one process-local store when STORE_DRIVER is memory', () => {
    const first = getDefaultDocumentStore();

    expect(first).toBeInstanceOf(InMemoryDocumentStore);
    expect(getDefaultDocumentStore()).toBe(first);
    expect(getDefaultDomainServices().documentStore).toBe(first);
    expect(admin.firestore).not.toHaveBeenCalled();
  });

  it('use Firestore when STORE_DRIVER is firestore', () => {
    const previous = process.env.STORE_DRIVER;
    process.env.STORE_DRIVER = 'firestore';

    try {
      jest.isolateModules(() => {
        const isolatedAdmin: typeof import('firebase-admin') = require('firebase-admin');
        const container: typeof import('../domain/serviceContainer') = require('../domain/serviceContainer');

        const store = container.getDefaultDocumentStore();

        expect(store.constructor.name).toBe('FirestoreDocumentStore');
        expect(isolatedAdmin.firestore).toHaveBeenCalledTimes(1);
      });
    } finally {
      process.env.STORE_DRIVER = previous;
    }
  });
});
