import type { GeoPoint } from '../types.js';

// One indexed price-paid transaction. Optional fields are left off the
// document entirely when the source record has no value for them.
export type SearchDocument = {
  transactionId: string;
  price: number;
  dateOfTransfer: string;
  postcode?: string;
  propertyType?: string;
  build: string;
  contract: string;
  building: string;
  street?: string;
  locality?: string;
  town: string;
  district: string;
  county: string;
  _geo?: GeoPoint;
};

export type DocumentField = keyof SearchDocument;

type Capability = 'filterable' | 'sortable' | 'facetable' | 'searchable';

export const DOCUMENT_FIELDS: Record<DocumentField, readonly Capability[]> = {
  transactionId: ['filterable'],
  price: ['facetable', 'sortable'],
  dateOfTransfer: ['filterable', 'sortable'],
  postcode: ['sortable'],
  propertyType: ['facetable', 'filterable'],
  build: ['facetable', 'filterable'],
  contract: ['facetable', 'filterable'],
  building: ['sortable'],
  street: ['searchable', 'sortable'],
  locality: ['facetable', 'filterable', 'searchable'],
  town: ['facetable', 'filterable', 'searchable', 'sortable'],
  district: ['facetable', 'filterable', 'searchable'],
  county: ['facetable', 'filterable', 'searchable'],
  _geo: ['filterable']
};

export const PRIMARY_KEY = 'transactionId' satisfies DocumentField;

export type FilterableField = 'town' | 'county' | 'locality' | 'district';
export type SortableField = 'building' | 'street' | 'town' | 'postcode' | 'dateOfTransfer' | 'price';
export type FacetField = 'town' | 'locality' | 'district' | 'county' | 'price';
export type GeoField = '_geo';

export const FACET_FIELDS: readonly FacetField[] = ['town', 'locality', 'district', 'county', 'price'];

export const SUGGESTER_FIELDS = ['street', 'locality', 'town', 'district', 'county'] as const;

export function fieldsWith(capability: Capability): DocumentField[] {
  const fields: DocumentField[] = [];
  for (const [field, capabilities] of Object.entries(DOCUMENT_FIELDS)) {
    if (capabilities.includes(capability) && isDocumentField(field)) fields.push(field);
  }
  return fields;
}

function isDocumentField(value: string): value is DocumentField {
  return Object.prototype.hasOwnProperty.call(DOCUMENT_FIELDS, value);
}
