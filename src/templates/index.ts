export { renderMenuPage, renderLoginPage, renderAdminPage } from "./render";
