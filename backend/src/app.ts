import express, { type Express } from "express";
import type { RatingEngine } from "./utils/rating_engine";
import { homeRouter } from "./routes/home";
import { smashRouter } from "./routes/smash";
import { galleryRouter, mediaFiles } from "./routes/gallery";
import { handleError, notFound } from "./routes/error_handler";
import { MEDIA_URL_PREFIX } from "./views/gallery";

export interface AppDependencies {
  engine: RatingEngine;
  mediaDir: string;
}

export function createApp({ engine, mediaDir }: AppDependencies): Express {
  const app: Express = express();

  app.use(express.urlencoded({ extended: false }));
  app.use(express.json());

  app.use(homeRouter());
  app.use("/smash", smashRouter(engine));
  app.use("/gallery", galleryRouter(mediaDir));
  app.use(MEDIA_URL_PREFIX, mediaFiles(mediaDir));

  app.use(notFound);
  app.use(handleError);

  return app;
}
