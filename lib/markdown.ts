import rehypeSanitize from "rehype-sanitize";
import rehypeStringify from "rehype-stringify";
import remarkGfm from "remark-gfm";
import remarkParse from "remark-parse";
import remarkRehype from "remark-rehype";
import { unified } from "unified";
import type { PlanSections } from "@/app/types";
import { orderedSections } from "@/lib/plan";

// Raw HTML in the source is dropped by remark-rehype (no allowDangerousHtml);
// rehype-sanitize then strips unsafe attributes and URL protocols.
const processor = unified()
  .use(remarkParse)
  .use(remarkGfm)
  .use(remarkRehype)
  .use(rehypeSanitize)
  .use(rehypeStringify);

export function renderMarkdown(markdown: string): string {
  if (!markdown.trim()) return "";
  return String(processor.processSync(markdown));
}

export function renderSections(sections: PlanSections): PlanSections {
  const html: PlanSections = {};
  for (const { key, content } of orderedSections(sections)) {
    html[key] = renderMarkdown(content);
  }
  return html;
}
