import Layout from "./Layout";

export default function LoginPage({ error }: { error?: string }) {
  return (
    <Layout title="Admin login">
      <h1>Admin login</h1>
      {error && (
        <p className="error" role="alert">
          {error}
        </p>
      )}
      <form method="post" action="/login" className="login">
        <label htmlFor="password">Password</label>
        <input id="password" name="password" type="password" autoFocus required />
        <button type="submit">Log in</button>
      </form>
      <footer>
        <a href="/">Back to menu</a>
      </footer>
    </Layout>
  );
}
