/**
 * Solr backend over HTTP
 *
 * Talks to one core with JSON responses. Request handlers:
 * - lexical: `/mlt` (MoreLikeThis handler) or `/select` with the MoreLikeThis component
 * - vector: `/select` with a `knn_text_to_vector` query
 * - native hybrid: a configurable handler path (default `/smlt`)
 */

import { z } from 'zod';
import type { BackendConfig } from '../config/schema.js';
import { RetrievalError, RetrievalErrorCode } from '../similarity/errors.js';
import { buildDocumentLookupQuery, VECTOR_TEXT_PARAM } from '../similarity/query-builder.js';
import { buildSourceText } from '../similarity/snippet.js';
import type { DocumentRef, LexicalParameters, QueryDescriptor, RawBackendResponse } from '../similarity/types.js';
import type { SearchBackend } from './types.js';

/**
 * Field list returned for result documents
 */
const RESULT_FIELDS = '*,score';

/**
 * Point-lookup answer: `response.docs`
 */
const LookupResponseSchema = z.object({
  response: z.object({
    docs: z.array(z.record(z.unknown())),
  }),
});

const TextFieldSchema = z.union([z.string(), z.array(z.string())]).catch('');

/**
 * Solr error payload
 */
const ErrorPayloadSchema = z.object({
  error: z.object({
    msg: z.string().optional(),
    code: z.number().optional(),
  }),
});

/**
 * Connection options for one core
 */
export type SolrBackendOptions = Pick<
  BackendConfig,
  'timeoutMs' | 'lexicalHandler' | 'nativeHandler' | 'jsonNl' | 'username' | 'password'
>;

function appendLexicalParams(params: URLSearchParams, lexical: LexicalParameters | undefined): void {
  if (lexical === undefined) return;
  params.set('mlt.fl', lexical.fields.join(','));
  params.set('mlt.mintf', String(lexical.minTermFreq));
  params.set('mlt.mindf', String(lexical.minDocFreq));
  params.set('mlt.boost', 'true');
  const boosts = Object.entries(lexical.fieldWeights).map(
    ([field, weight]) => `${field}^${String(weight)}`
  );
  if (boosts.length > 0) {
    params.set('mlt.qf', boosts.join(' '));
  }
}

/**
 * Solr core client
 */
export class SolrBackend implements SearchBackend {
  readonly name: string;

  private coreUrl: string;
  private options: SolrBackendOptions;

  constructor(coreUrl: string, options: SolrBackendOptions) {
    this.coreUrl = coreUrl.replace(/\/+$/, '');
    this.name = this.coreUrl;
    this.options = options;
  }

  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
    };

    if (this.options.username !== undefined && this.options.username !== '') {
      const credentials = `${this.options.username}:${this.options.password ?? ''}`;
      headers.Authorization = `Basic ${Buffer.from(credentials).toString('base64')}`;
    }

    return headers;
  }

  private baseParams(): URLSearchParams {
    return new URLSearchParams({ wt: 'json', 'json.nl': this.options.jsonNl });
  }

  /**
   * Handler path and parameters for a descriptor
   */
  buildRequest(descriptor: QueryDescriptor): { handler: string; params: URLSearchParams } {
    const params = this.baseParams();
    params.set('q', descriptor.query);
    params.set('fl', RESULT_FIELDS);

    const componentMlt =
      descriptor.algorithm === 'lexical' && this.options.lexicalHandler === 'select';
    // filters on select would apply to the source document, the only main hit;
    // type and container filters then run client-side in the result policy
    if (!componentMlt) {
      for (const fq of descriptor.filterQueries) {
        params.append('fq', fq);
      }
    }

    switch (descriptor.algorithm) {
      case 'lexical': {
        appendLexicalParams(params, descriptor.lexical);
        if (componentMlt) {
          params.set('mlt', 'true');
          params.set('mlt.count', String(descriptor.rows));
          params.set('rows', '1');
          return { handler: 'select', params };
        }
        params.set('mlt.match.include', 'false');
        params.set('rows', String(descriptor.rows));
        return { handler: 'mlt', params };
      }
      case 'vector': {
        if (descriptor.vector !== undefined) {
          params.set(VECTOR_TEXT_PARAM, descriptor.vector.text);
        }
        params.set('rows', String(descriptor.rows));
        return { handler: 'select', params };
      }
      case 'hybrid-native': {
        appendLexicalParams(params, descriptor.lexical);
        if (descriptor.fusion !== undefined) {
          params.set('smlt.mltWeight', String(descriptor.fusion.lexicalWeight));
          params.set('smlt.vectorWeight', String(descriptor.fusion.vectorWeight));
        }
        params.set('rows', String(descriptor.rows));
        return { handler: this.options.nativeHandler.replace(/^\/+/, ''), params };
      }
    }
  }

  /**
   * GET a handler and return the decoded JSON body
   */
  private async request(handler: string, params: URLSearchParams): Promise<unknown> {
    const url = `${this.coreUrl}/${handler}?${params.toString()}`;

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: this.getHeaders(),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new RetrievalError(
        `Backend request to ${this.name}/${handler} failed: ${error instanceof Error ? error.message : String(error)}`,
        RetrievalErrorCode.BACKEND_UNAVAILABLE,
        error instanceof Error ? error : undefined
      );
    }

    if (!response.ok) {
      const errorText = await response.text();
      const code =
        response.status >= 400 && response.status < 500 && response.status !== 404
          ? RetrievalErrorCode.BACKEND_QUERY_ERROR
          : RetrievalErrorCode.BACKEND_UNAVAILABLE;
      throw new RetrievalError(
        `Backend error (${response.status}) from ${this.name}/${handler}: ${errorText}`,
        code
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new RetrievalError(
        `Backend returned invalid JSON from ${this.name}/${handler}`,
        RetrievalErrorCode.BACKEND_UNAVAILABLE,
        error instanceof Error ? error : undefined
      );
    }

    const errorPayload = ErrorPayloadSchema.safeParse(payload);
    if (errorPayload.success) {
      throw new RetrievalError(
        `Backend rejected query: ${errorPayload.data.error.msg ?? 'unknown error'}`,
        RetrievalErrorCode.BACKEND_QUERY_ERROR
      );
    }

    return payload;
  }

  async execute(descriptor: QueryDescriptor): Promise<RawBackendResponse> {
    const { handler, params } = this.buildRequest(descriptor);
    const payload = await this.request(handler, params);
    const response: RawBackendResponse =
      descriptor.sourceBackendId === undefined
        ? { algorithm: descriptor.algorithm, payload }
        : { algorithm: descriptor.algorithm, payload, sourceBackendId: descriptor.sourceBackendId };
    return response;
  }

  /**
   * First document matching a reference, restricted to `fields`
   */
  private async lookup(ref: DocumentRef, fields: string): Promise<Record<string, unknown> | null> {
    const params = this.baseParams();
    params.set('q', buildDocumentLookupQuery(ref));
    params.set('fl', fields);
    params.set('rows', '1');

    const payload = await this.request('select', params);
    const parsed = LookupResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new RetrievalError(
        `Unexpected lookup response from ${this.name}`,
        RetrievalErrorCode.UNPARSABLE_RESPONSE
      );
    }
    return parsed.data.response.docs[0] ?? null;
  }

  async resolveDocumentId(ref: DocumentRef): Promise<string | null> {
    const doc = await this.lookup(ref, 'id');
    if (doc === null) return null;
    const id = doc.id;
    if (typeof id === 'string' && id !== '') return id;
    if (typeof id === 'number') return String(id);
    return null;
  }

  async resolveDocumentText(ref: DocumentRef): Promise<string | null> {
    const doc = await this.lookup(ref, 'title,content');
    if (doc === null) return null;
    const text = buildSourceText(TextFieldSchema.parse(doc.title), TextFieldSchema.parse(doc.content));
    return text === '' ? null : text;
  }
}
