/**
 * HTML pages: public menu, login/logout, admin
 */

import { Router, urlencoded } from "express";
import { z } from "zod";
import type { AppConfig, CatalogRuntime, Logger } from "@/types";
import { SESSION_COOKIE_NAME } from "@/constants";
import { createSessionToken, passwordMatches } from "@/auth";
import { getAdminView, getMenuGroups } from "@/menu";
import { renderAdminPage, renderLoginPage, renderMenuPage } from "@/templates";
import { requireAuth } from "../middleware/requireAuth";

const LoginForm = z.object({
  password: z.string().default(""),
});

export function pagesRouter(
  catalog: CatalogRuntime,
  config: AppConfig,
  log: Logger,
): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    res.type("html").send(renderMenuPage(getMenuGroups(catalog)));
  });

  router.get("/login", (_req, res) => {
    res.type("html").send(renderLoginPage());
  });

  router.post("/login", urlencoded({ extended: false }), (req, res) => {
    const form = LoginForm.safeParse(req.body ?? {});
    const password = form.success ? form.data.password : "";

    if (!passwordMatches(password, config.adminPassword)) {
      log.warn("Failed admin login", { ip: req.ip });
      res.status(401).type("html").send(renderLoginPage("Incorrect password"));
      return;
    }

    const token = createSessionToken(config.secretKey, config.sessionTtlSeconds);
    res.cookie(SESSION_COOKIE_NAME, token, {
      httpOnly: true,
      sameSite: "lax",
      secure: req.secure,
      path: "/",
      maxAge: config.sessionTtlSeconds * 1000,
    });
    log.info("Admin logged in", { ip: req.ip });
    res.redirect(302, "/admin");
  });

  router.get("/logout", (_req, res) => {
    res.clearCookie(SESSION_COOKIE_NAME, { path: "/" });
    res.redirect(302, "/");
  });

  router.get("/admin", requireAuth(config.secretKey), (_req, res) => {
    res.type("html").send(renderAdminPage(getAdminView(catalog)));
  });

  return router;
}
