import { type RequestHandler, Router } from 'express';

import type { GeocoderProvider } from '../config/env';
import { renderIndexPage } from '../views/pages';

export interface PagesRouteDeps {
  geocoder: GeocoderProvider;
  geocoderApiKey: string;
}

export function createPagesRouter({ geocoder, geocoderApiKey }: PagesRouteDeps): Router {
  const router = Router();

  const indexHandler: RequestHandler = (request, response) => {
    const html = renderIndexPage({
      geocoder,
      geocoderApiKey,
      user: request.session.user ?? null,
    });
    response.status(200).type('html').send(html);
  };

  router.get('/', indexHandler);
  return router;
}
