import * as admin from 'firebase-admin';
import { storeConfig, updatePolicyConfig } from '../../config';
import type { DocumentStore } from '../repositories/documents/DocumentStore';
import { FirestoreDocumentStore } from '../repositories/documents/FirestoreDocumentStore';
import { InMemoryDocumentStore } from '../repositories/documents/InMemoryDocumentStore';
import { bookingResource, type BookingFields } from './bookings/bookingResource';
import { dogResource, type DogFields } from './dogs/dogResource';
import { ownerResource, type OwnerFields } from './owners/ownerResource';
import type { BlankReferencePolicy } from './resources/partialUpdate';
import { ResourceDomainService } from './resources/ResourceDomainService';
import { sitterResource, type SitterFields } from './sitters/sitterResource';

export type DomainServiceContainer = {
  documentStore: DocumentStore;
  ownerService: ResourceDomainService<OwnerFields>;
  dogService: ResourceDomainService<DogFields>;
  sitterService: ResourceDomainService<SitterFields>;
  bookingService: ResourceDomainService<BookingFields>;
};

export type CreateDomainServiceContainerOptions = {
  documentStore: DocumentStore;
  blankReferencePolicy?: BlankReferencePolicy;
};

export function createDomainServiceContainer(
  options: CreateDomainServiceContainerOptions,
): DomainServiceContainer {
  const { documentStore } = options;
  const serviceOptions = { blankReferencePolicy: options.blankReferencePolicy };

  return {
    documentStore,
    ownerService: new ResourceDomainService(ownerResource, documentStore, serviceOptions),
    dogService: new ResourceDomainService(dogResource, documentStore, serviceOptions),
    sitterService: new ResourceDomainService(sitterResource, documentStore, serviceOptions),
    bookingService: new ResourceDomainService(bookingResource, documentStore, serviceOptions),
  };
}

let memoryStore: InMemoryDocumentStore | null = null;

// Getter so Firestore is only touched after admin.initializeApp()
export function getDefaultDocumentStore(): DocumentStore {
  if (storeConfig.driver === 'memory') {
    memoryStore = memoryStore ?? new InMemoryDocumentStore();
    return memoryStore;
  }

  return new FirestoreDocumentStore(admin.firestore());
}

export function getDefaultDomainServices(): DomainServiceContainer {
  return createDomainServiceContainer({
    documentStore: getDefaultDocumentStore(),
    blankReferencePolicy: updatePolicyConfig.blankReferencePolicy,
  });
}
