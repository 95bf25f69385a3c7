import { type RequestHandler, type Response, Router } from 'express';

import { requireAdmin } from '../middleware/auth';
import { validateCreateMarkerPayload } from '../services/markerValidation';
import type {
  CreateMarkerPersistenceInput,
  ErrorResponse,
  MarkerJson,
  MarkerRecord,
  MessageResponse,
} from '../types/marker';
import { serializeMarker } from '../types/marker';

export interface MarkersRouteDeps {
  now: () => Date;
  listMarkers: () => Promise<MarkerRecord[]>;
  createMarker: (input: CreateMarkerPersistenceInput) => Promise<MarkerRecord>;
  removeMarker: (markerId: number) => Promise<{ removed: boolean }>;
  setMarkerActive: (markerId: number, isActive: boolean) => Promise<MarkerRecord | null>;
  authEnabled: boolean;
}

type ListMarkersResult =
  | { statusCode: 200; body: MarkerJson[] }
  | { statusCode: 500; body: ErrorResponse };

type CreateMarkerResult =
  | { statusCode: 201; body: MarkerJson }
  | { statusCode: 400; body: ErrorResponse }
  | { statusCode: 500; body: ErrorResponse };

type DeleteMarkerResult =
  | { statusCode: 200; body: MessageResponse }
  | { statusCode: 404; body: ErrorResponse }
  | { statusCode: 500; body: ErrorResponse };

type SetMarkerActiveResult =
  | { statusCode: 200; body: MarkerJson }
  | { statusCode: 404; body: ErrorResponse }
  | { statusCode: 500; body: ErrorResponse };

const NOT_FOUND: { statusCode: 404; body: ErrorResponse } = {
  statusCode: 404,
  body: { error: 'Marker not found' },
};

const INTERNAL_ERROR: { statusCode: 500; body: ErrorResponse } = {
  statusCode: 500,
  body: { error: 'Internal server error' },
};

function logFailure(action: string, requestId: string, error: unknown): void {
  const reason = error instanceof Error ? error.message : String(error);
  console.error(`[markers] Failed to ${action}`, { requestId, reason });
}

/** Path ids are positive integers; anything else can never match a marker. */
export function parseMarkerId(raw: string): number | null {
  if (!/^\d+$/.test(raw)) {
    return null;
  }
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

export async function processListMarkersRequest(input: {
  requestId: string;
  listMarkers: MarkersRouteDeps['listMarkers'];
}): Promise<ListMarkersResult> {
  try {
    const markers = await input.listMarkers();
    return { statusCode: 200, body: markers.map(serializeMarker) };
  } catch (error) {
    logFailure('list markers', input.requestId, error);
    return INTERNAL_ERROR;
  }
}

export async function processCreateMarkerRequest(input: {
  payload: unknown;
  requestId: string;
  now: MarkersRouteDeps['now'];
  createMarker: MarkersRouteDeps['createMarker'];
}): Promise<CreateMarkerResult> {
  const validation = validateCreateMarkerPayload(input.payload);
  if (!validation.ok) {
    return { statusCode: 400, body: { error: validation.error.message } };
  }

  try {
    const marker = await input.createMarker({
      ...validation.value,
      createdAt: input.now(),
    });
    return { statusCode: 201, body: serializeMarker(marker) };
  } catch (error) {
    logFailure('create marker', input.requestId, error);
    return INTERNAL_ERROR;
  }
}

export async function processDeleteMarkerRequest(input: {
  markerId: string;
  requestId: string;
  removeMarker: MarkersRouteDeps['removeMarker'];
}): Promise<DeleteMarkerResult> {
  const markerId = parseMarkerId(input.markerId);
  if (markerId === null) {
    return NOT_FOUND;
  }

  try {
    const result = await input.removeMarker(markerId);
    if (!result.removed) {
      return NOT_FOUND;
    }
    return { statusCode: 200, body: { message: 'Marker deleted successfully' } };
  } catch (error) {
    logFailure('delete marker', input.requestId, error);
    return INTERNAL_ERROR;
  }
}

export async function processSetMarkerActiveRequest(input: {
  markerId: string;
  isActive: boolean;
  requestId: string;
  setMarkerActive: MarkersRouteDeps['setMarkerActive'];
}): Promise<SetMarkerActiveResult> {
  const markerId = parseMarkerId(input.markerId);
  if (markerId === null) {
    return NOT_FOUND;
  }

  try {
    const marker = await input.setMarkerActive(markerId, input.isActive);
    if (!marker) {
      return NOT_FOUND;
    }
    return { statusCode: 200, body: serializeMarker(marker) };
  } catch (error) {
    logFailure(input.isActive ? 'reactivate marker' : 'shut down marker', input.requestId, error);
    return INTERNAL_ERROR;
  }
}

function readRequestId(response: Response): string {
  const requestId = response.locals.requestId;
  return typeof requestId === 'string' ? requestId : 'unknown';
}

export function createMarkersRouter({
  now,
  listMarkers,
  createMarker,
  removeMarker,
  setMarkerActive,
  authEnabled,
}: MarkersRouteDeps): Router {
  const router = Router();
  const adminOnly: RequestHandler[] = authEnabled ? [requireAdmin] : [];

  const listHandler: RequestHandler = async (_request, response) => {
    const result = await processListMarkersRequest({
      requestId: readRequestId(response),
      listMarkers,
    });
    response.status(result.statusCode).json(result.body);
  };

  const createHandler: RequestHandler = async (request, response) => {
    const result = await processCreateMarkerRequest({
      payload: request.body,
      requestId: readRequestId(response),
      now,
      createMarker,
    });
    response.status(result.statusCode).json(result.body);
  };

  const deleteHandler: RequestHandler = async (request, response) => {
    const result = await processDeleteMarkerRequest({
      markerId: request.params.id,
      requestId: readRequestId(response),
      removeMarker,
    });
    response.status(result.statusCode).json(result.body);
  };

  const toggleHandler =
    (isActive: boolean): RequestHandler =>
    async (request, response) => {
      const result = await processSetMarkerActiveRequest({
        markerId: request.params.id,
        isActive,
        requestId: readRequestId(response),
        setMarkerActive,
      });
      response.status(result.statusCode).json(result.body);
    };

  router.get('/api/markers', listHandler);
  router.post('/api/markers', ...adminOnly, createHandler);
  router.delete('/api/markers/:id', ...adminOnly, deleteHandler);
  router.put('/api/markers/:id/shutdown', ...adminOnly, toggleHandler(false));
  router.put('/api/markers/:id/reactivate', ...adminOnly, toggleHandler(true));

  return router;
}
