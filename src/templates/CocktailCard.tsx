import type { IngredientRaw, MenuCocktail } from "@/types";

function formatIngredient(ingredient: IngredientRaw): string {
  const amount = [ingredient.qty, ingredient.unit]
    .filter((part) => part !== undefined && part !== "")
    .join(" ");
  return amount ? `${amount} ${ingredient.name}` : ingredient.name;
}

export default function CocktailCard({ cocktail }: { cocktail: MenuCocktail }) {
  const steps =
    cocktail.instructions === undefined
      ? []
      : Array.isArray(cocktail.instructions)
        ? cocktail.instructions
        : [cocktail.instructions];

  return (
    <article className={cocktail.enabled ? "cocktail" : "cocktail unavailable"}>
      <header>
        <h3>{cocktail.name}</h3>
        {!cocktail.enabled && <span className="badge">Unavailable</span>}
      </header>
      {cocktail.description && <p className="description">{cocktail.description}</p>}
      <ul className="ingredients">
        {cocktail.ingredients.map((ingredient, index) => (
          <li key={`${index}-${ingredient.name}`}>{formatIngredient(ingredient)}</li>
        ))}
      </ul>
      {steps.length > 0 && (
        <ol className="instructions">
          {steps.map((step, index) => (
            <li key={index}>{step}</li>
          ))}
        </ol>
      )}
      {(cocktail.glass || cocktail.garnish) && (
        <p className="serving">
          {cocktail.glass && <span>Glass: {cocktail.glass}</span>}
          {cocktail.garnish && <span>Garnish: {cocktail.garnish}</span>}
        </p>
      )}
    </article>
  );
}
