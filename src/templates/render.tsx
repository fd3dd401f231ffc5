/**
 * Server-side rendering of page templates
 */

import type { ReactElement } from "react";
import { renderToStaticMarkup } from "react-dom/server";
import type { AdminView, AlcoholGroup } from "@/types";
import MenuPage from "./MenuPage";
import LoginPage from "./LoginPage";
import AdminPage from "./AdminPage";

function renderDocument(element: ReactElement): string {
  return `<!DOCTYPE html>${renderToStaticMarkup(element)}`;
}

export function renderMenuPage(groups: AlcoholGroup[]): string {
  return renderDocument(<MenuPage groups={groups} />);
}

export function renderLoginPage(error?: string): string {
  return renderDocument(<LoginPage error={error} />);
}

export function renderAdminPage(view: AdminView): string {
  return renderDocument(<AdminPage view={view} />);
}
