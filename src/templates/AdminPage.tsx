import type { AdminView } from "@/types";
import { isIngredientAvailable } from "@/menu/availability";
import Layout from "./Layout";

export default function AdminPage({ view }: { view: AdminView }) {
  return (
    <Layout title="Manage cocktails" scripts={["/static/admin.js"]}>
      <h1>Manage cocktails</h1>
      <nav>
        <a href="/">Menu</a> · <a href="/logout">Log out</a>
      </nav>

      <section className="admin-ingredients">
        <h2>Ingredients</h2>
        <ul>
          {view.ingredients.map((name) => {
            const available = isIngredientAvailable(view.ingredientsState, name);
            return (
              <li key={name} className={available ? "in-stock" : "out-of-stock"}>
                <button type="button" data-ingredient={name} aria-pressed={available}>
                  {name}
                </button>
              </li>
            );
          })}
        </ul>
      </section>

      <section className="admin-cocktails">
        <h2>Cocktails</h2>
        {view.groups.map((group) => (
          <div key={group.alcohol} className="group">
            <h3>{group.alcohol}</h3>
            <ul>
              {group.cocktails.map((cocktail) => (
                <li
                  key={cocktail.name}
                  className={cocktail.enabled ? "enabled" : "disabled"}
                >
                  <button
                    type="button"
                    data-cocktail={cocktail.name}
                    aria-pressed={cocktail.enabled}
                  >
                    {cocktail.name}
                  </button>
                  {cocktail.isOverride && <span className="badge">manual</span>}
                </li>
              ))}
            </ul>
          </div>
        ))}
      </section>
    </Layout>
  );
}
