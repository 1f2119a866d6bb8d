/**
 * Page shown to visitors who follow a short link that does not exist.
 */

export const NOT_FOUND_PAGE = `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <title>Short URL Not Found</title>
  </head>
  <body style="font-family: Arial, sans-serif; text-align: center; margin-top: 100px;">
    <h1>Short URL Not Found</h1>
    <p>The requested short URL does not exist or has been removed.</p>
    <a href="/" style="color: #667eea; text-decoration: none;">&larr; Go back to homepage</a>
  </body>
</html>
`;
