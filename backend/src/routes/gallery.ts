import express, { Router } from "express";
import { listMedia } from "../utils/media_library";
import { renderGallery } from "../views/gallery";
import { asyncHandler } from "./async_handler";

export function galleryRouter(mediaDir: string): Router {
  const router = Router();

  router.get(
    "/",
    asyncHandler(async (_req, res) => {
      res.send(renderGallery(await listMedia(mediaDir)));
    })
  );

  return router;
}

// Files go out exactly as they sit on disk
export const mediaFiles = (mediaDir: string) =>
  express.static(mediaDir, { index: false, dotfiles: "ignore", fallthrough: true });
