import type { AlcoholGroup } from "@/types";
import Layout from "./Layout";
import CocktailCard from "./CocktailCard";

export default function MenuPage({ groups }: { groups: AlcoholGroup[] }) {
  return (
    <Layout title="Cocktail Menu">
      <h1>Cocktail Menu</h1>
      {groups.length === 0 && <p className="empty">No cocktails on the menu yet.</p>}
      {groups.map((group) => (
        <section key={group.alcohol} className="group">
          <h2>{group.alcohol}</h2>
          {group.cocktails.map((cocktail) => (
            <CocktailCard key={cocktail.name} cocktail={cocktail} />
          ))}
        </section>
      ))}
      <footer>
        <a href="/admin">Admin</a>
      </footer>
    </Layout>
  );
}
