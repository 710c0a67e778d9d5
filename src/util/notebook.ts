import { DEFAULT_NOTEBOOK_LANGUAGE } from "../constant.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Cell sources are stored either as one string or as a list of lines
 */
function getCellSource(source: unknown): string {
  if (Array.isArray(source)) {
    return source.filter((line): line is string => typeof line === "string").join("");
  }
  return typeof source === "string" ? source : "";
}

export function getNotebookLanguage(notebook: Record<string, unknown>): string {
  const metadata = notebook.metadata;
  if (!isRecord(metadata)) {
    return DEFAULT_NOTEBOOK_LANGUAGE;
  }

  const languageInfo = metadata.language_info;
  if (isRecord(languageInfo) && typeof languageInfo.name === "string" && languageInfo.name.trim()) {
    return languageInfo.name.trim();
  }

  const kernelspec = metadata.kernelspec;
  if (isRecord(kernelspec) && typeof kernelspec.language === "string" && kernelspec.language.trim()) {
    return kernelspec.language.trim();
  }

  return DEFAULT_NOTEBOOK_LANGUAGE;
}

/**
 * Renders a notebook as text: a heading naming the file, then every markdown
 * cell as-is and every code cell as a fenced block, numbered from 1 in
 * notebook order. Cells of other types are left out but keep their number.
 *
 * @throws when the content is not a JSON notebook
 */
export function extractNotebookText(fileName: string, content: string): string {
  const notebook: unknown = JSON.parse(content);
  if (!isRecord(notebook)) {
    throw new Error("Notebook is not a JSON object");
  }

  const cells = Array.isArray(notebook.cells) ? notebook.cells : [];
  const language = getNotebookLanguage(notebook);
  const parts = [`# Jupyter Notebook: ${fileName}\n`];

  cells.forEach((cell: unknown, index) => {
    if (!isRecord(cell)) {
      return;
    }

    const cellNumber = index + 1;
    const source = getCellSource(cell.source);

    if (cell.cell_type === "markdown") {
      parts.push(`## Cell ${cellNumber} (Markdown)\n${source}\n`);
    } else if (cell.cell_type === "code") {
      parts.push(`## Cell ${cellNumber} (Code)\n\`\`\`${language}\n${source}\n\`\`\`\n`);
    }
  });

  return parts.join("\n\n");
}
