import { CredentialsFor, resolveCredentials } from '../../config/credentials';
import { JsonObject } from '../../types/http';
import { FathomMeetingQuery, TransportOptions } from '../../types/integrations';
import { logger } from '../../utils/logger';
import { ApiKeyAuth } from '../http/auth.strategy';
import { HttpClient } from '../http/http.client';

export const FATHOM_BASE_URL = 'https://api.fathom.ai/external/v1';

export interface TranscriptWithRecording {
  transcript: JsonObject;
  recording: JsonObject | null;
}

export class FathomClient {
  readonly http: HttpClient;

  constructor(
    credentials: CredentialsFor<'fathom'> = resolveCredentials('fathom'),
    options: TransportOptions = {}
  ) {
    this.http = new HttpClient({
      ...options,
      service: 'Fathom',
      baseUrl: FATHOM_BASE_URL,
      auth: new ApiKeyAuth('X-Api-Key', credentials.FATHOM_API_KEY),
    });
  }

  listMeetings(query: FathomMeetingQuery = {}): Promise<JsonObject> {
    return this.http.get('/meetings', {
      include_summary: query.includeSummary ?? true,
      include_action_items: query.includeActionItems ?? true,
      limit: query.limit ?? 50,
      'calendar_invitees_domains[]': query.domain,
      created_after: query.createdAfter,
      created_before: query.createdBefore,
    });
  }

  getTranscript(recordingId: string): Promise<JsonObject> {
    return this.http.get(`/recordings/${encodeURIComponent(recordingId)}/transcript`);
  }

  getRecording(recordingId: string): Promise<JsonObject> {
    return this.http.get(`/recordings/${encodeURIComponent(recordingId)}`);
  }

  /** Transcript plus recording metadata; the metadata is optional enrichment. */
  async getTranscriptWithRecording(recordingId: string): Promise<TranscriptWithRecording> {
    const transcript = await this.getTranscript(recordingId);

    try {
      const recording = await this.getRecording(recordingId);
      return { transcript, recording };
    } catch (error: unknown) {
      logger.warn('Fathom recording metadata unavailable', {
        recordingId,
        error: error instanceof Error ? error.message : String(error),
      });
      return { transcript, recording: null };
    }
  }
}
