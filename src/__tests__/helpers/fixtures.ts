/**
 * Test Fixtures
 * Reusable page bodies
 */

/**
 * Page whose body is a list of anchors plus optional extra markup
 */
export function linkPage(hrefs: string[], extra: string = ''): string {
  const anchors = hrefs.map((href) => `<a href="${href}">link</a>`).join('\n');
  return `<!DOCTYPE html>
<html>
<head><title>Test Page</title></head>
<body>
${anchors}
${extra}
</body>
</html>`;
}

export const plainHtml = `
<!DOCTYPE html>
<html>
<head><title>About us</title></head>
<body>
  <h1>About us</h1>
  <p>We sell things.</p>
</body>
</html>
`;

export const jsonLdProductMarkup = '<script type="application/ld+json">{"@type":"Product"}</script>';

export const productContainerMarkup = '<div class="product-detail"><h1>Blue Widget</h1></div>';

export const purchaseFormMarkup = `
<form>
  <select name="size"><option>Size</option><option>M</option></select>
  <button type="submit">Add to Cart</button>
</form>
`;
