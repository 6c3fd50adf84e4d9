import React from "react";

type Props = {
  readonly models: readonly string[];
  readonly supportedFormats: readonly string[];
  readonly question: string;
  readonly model: string;
};

export function AskForm({
  models,
  supportedFormats,
  question,
  model,
}: Props): React.JSX.Element {
  return (
    <form method="post" action="/" encType="multipart/form-data">
      <label htmlFor="document">Upload Document</label>
      <input
        id="document"
        type="file"
        name="document"
        accept={supportedFormats.join(",")}
      />
      <label htmlFor="model">Select Model</label>
      <select id="model" name="model" defaultValue={model}>
        {models.map((name) => (
          <option key={name} value={name}>
            {name}
          </option>
        ))}
      </select>
      <label htmlFor="question">Question</label>
      <input
        id="question"
        type="text"
        name="question"
        placeholder="Ask a question about the document"
        defaultValue={question}
      />
      <button type="submit">Get Answer</button>
    </form>
  );
}
