export function getIndexHTML(): string {
  return `<!doctype html>
<html>
  <head>
    <title>Slab Users</title>
  </head>
  <body>
    <h3>Slab Users</h3>
    <p>In-memory user records.</p>
    <ul>
      <li><code>GET /users</code> lists user ids</li>
      <li><code>POST /user/</code> creates a user</li>
      <li><code>GET | PUT | DELETE /user/{id}</code> reads, replaces or deletes a user</li>
    </ul>
  </body>
</html>
`;
}
