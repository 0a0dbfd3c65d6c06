export const PROPERTY_TYPES = ['Detached', 'SemiDetached', 'Terraced', 'FlatsMaisonettes', 'Other'] as const;
export const BUILD_TYPES = ['NewBuild', 'OldStock'] as const;
export const CONTRACT_TYPES = ['Freehold', 'Leasehold'] as const;

export type PropertyType = (typeof PROPERTY_TYPES)[number];
export type BuildType = (typeof BUILD_TYPES)[number];
export type ContractType = (typeof CONTRACT_TYPES)[number];

export interface BuildDetails {
  propertyType?: PropertyType;
  build: BuildType;
  contract: ContractType;
}

export interface Address {
  building: string;
  street?: string;
  locality?: string;
  townCity: string;
  district: string;
  county: string;
  postcode?: string;
}

export interface PropertyResult {
  transactionId: string; // uuid
  price: number;
  dateOfTransfer: string; // yyyy-mm-dd
  buildDetails: BuildDetails;
  address: Address;
}

export interface GeoPoint {
  lat: number;
  lng: number;
}

export const PROPERTY_TABLE_COLUMNS = ['street', 'town', 'postcode', 'date', 'price'] as const;
export type PropertyTableColumn = (typeof PROPERTY_TABLE_COLUMNS)[number];

export type SortDirection = 'ascending' | 'descending';

export interface PropertyFilter {
  town?: string;
  county?: string;
  locality?: string;
  district?: string;
}

export interface Sort {
  // Free-form on purpose: unknown columns leave the backend order untouched.
  sortColumn?: string;
  sortDirection?: SortDirection;
}

export interface FindGenericRequest {
  text?: string;
  filter: PropertyFilter;
  sort: Sort;
  page: number;
}

export interface FindByPostcodeRequest {
  postcode: string;
  maxDistance: number; // km
  filter: PropertyFilter;
  sort: Sort;
  page: number;
}

export interface Facets {
  towns: string[];
  localities: string[];
  districts: string[];
  counties: string[];
  prices: string[];
}

export interface FindPropertiesResponse {
  results: PropertyResult[];
  totalTransactions?: number;
  facets: Facets;
  page: number;
}

export interface SuggestRequest {
  text: string;
}

export interface SuggestionResponse {
  suggestions: string[];
}

export interface IngestionSummary {
  submitted: number;
  withoutGeo: number;
}
