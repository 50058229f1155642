import type { HttpClientOptions } from '../services/http/http.client';
import type { JsonObject } from './http';

/** Transport knobs a vendor client passes through to its HttpClient. */
export type TransportOptions = Omit<HttpClientOptions, 'service' | 'baseUrl' | 'auth' | 'errorMapper'>;

// Beam

export interface BeamTaskQuery {
  agentId?: string;
  statuses?: string[];
  searchQuery?: string;
  startDate?: string;
  endDate?: string;
  pageNum?: number;
  pageSize?: number;
  ordering?: string;
}

export interface BeamTaskInput {
  agentId: string;
  taskQuery: string;
  parsingUrls?: string[];
}

export interface BeamOutputRating {
  taskNodeId: string;
  rating: number;
  userFeedback?: string;
  expectedOutput?: string;
}

// HubSpot

export type HubSpotObjectType =
  | 'contacts'
  | 'companies'
  | 'deals'
  | 'notes'
  | 'calls'
  | 'emails'
  | 'meetings';

export interface HubSpotObject extends JsonObject {
  id: string;
  properties: Record<string, string | null>;
}

export interface HubSpotSearchFilter {
  propertyName: string;
  operator: 'EQ' | 'NEQ' | 'CONTAINS_TOKEN' | 'GT' | 'LT' | 'GTE' | 'LTE' | 'HAS_PROPERTY';
  value?: string;
}

export interface HubSpotSearchRequest {
  query?: string;
  filters?: HubSpotSearchFilter[];
  properties?: string[];
  limit?: number;
  after?: string;
}

// HeyReach

export interface HeyReachLead {
  profileUrl: string;
  firstName?: string;
  lastName?: string;
  email?: string;
}

// Fathom

export interface FathomMeetingQuery {
  domain?: string;
  includeSummary?: boolean;
  includeActionItems?: boolean;
  createdAfter?: string;
  createdBefore?: string;
  limit?: number;
}

// Airtable

export interface AirtableBase {
  id: string;
  name: string;
  permission_level: string;
  tables?: AirtableTable[];
}

export interface AirtableField {
  id: string;
  name: string;
  type: string;
  choices?: string[];
}

export interface AirtableTable {
  id: string;
  name: string;
  primary_field_id: string | null;
  fields: AirtableField[];
}

export interface AirtableRecord extends JsonObject {
  id: string;
  fields: JsonObject;
}

export interface AirtableRecordQuery {
  filterByFormula?: string;
  fields?: string[];
  view?: string;
  sort?: Array<{ field: string; direction: 'asc' | 'desc' }>;
  limit?: number;
}

// Linear

export interface LinearIssueInput {
  title: string;
  teamId: string;
  description?: string;
  projectId?: string;
  stateId?: string;
  priority?: number;
  assigneeId?: string;
}

export interface LinearIssueUpdate {
  stateId?: string;
  priority?: number;
  assigneeId?: string;
}
