import { Router } from "express";
import { renderHome } from "../views/home";

export function homeRouter(): Router {
  const router = Router();

  router.get(["/", "/home", "/index"], (_req, res) => {
    res.send(renderHome());
  });

  router.get("/api/ping", (_req, res) => {
    res.type("text/plain").send("Server is online");
  });

  return router;
}
