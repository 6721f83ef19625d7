import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { renderToStaticMarkup } from "react-dom/server";
import ClosestPairPlot, { DEFAULT_TITLE, type ClosestPairPlotProps } from "./components/ClosestPairPlot";

export function renderPlotHtml(props: ClosestPairPlotProps): string {
  const title = props.title ?? DEFAULT_TITLE;
  const body = renderToStaticMarkup(
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <title>{title}</title>
      </head>
      <body>
        <ClosestPairPlot {...props} />
      </body>
    </html>
  );
  return `<!DOCTYPE html>${body}`;
}

export async function writePlot(file: string, props: ClosestPairPlotProps): Promise<string> {
  const out = path.resolve(file);
  await mkdir(path.dirname(out), { recursive: true });
  await writeFile(out, renderPlotHtml(props), "utf8");
  return out;
}
