import React from "react";
import { AskForm } from "./ask-form.js";
import { AnswerPanel } from "./answer-panel.js";
import type { AskPageView } from "../types.js";

const PAGE_STYLE = `
body { font-family: system-ui, sans-serif; max-width: 720px; margin: 2rem auto; padding: 0 1rem; }
form { display: grid; gap: 0.5rem; }
pre { white-space: pre-wrap; background: #f4f4f5; padding: 1rem; min-height: 3rem; }
`;

export function AskPage(view: AskPageView): React.JSX.Element {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <title>{view.title}</title>
        <style>{PAGE_STYLE}</style>
      </head>
      <body>
        <h1>{view.title}</h1>
        <AskForm
          models={view.models}
          supportedFormats={view.supportedFormats}
          question={view.question}
          model={view.model}
        />
        <AnswerPanel answer={view.answer} />
      </body>
    </html>
  );
}
