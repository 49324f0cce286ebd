import type { FormEvent } from "react";
import type { TranslateFn } from "../types/translations";

type RenameInlineFormProps = {
  t: TranslateFn;
  keyName: string;
  value: string;
  error: string | null;
  onChange: (value: string) => void;
  onApply: () => void;
  onCancel: () => void;
};

export default function RenameInlineForm({
  t,
  keyName,
  value,
  error,
  onChange,
  onApply,
  onCancel,
}: RenameInlineFormProps) {
  const handleSubmit = (event: FormEvent) => {
    event.preventDefault();
    onApply();
  };

  return (
    <form className="rename-form" onSubmit={handleSubmit}>
      <input
        aria-label={t("renameKeyInput", { key: keyName })}
        value={value}
        autoFocus
        onChange={(event) => onChange(event.target.value)}
        onKeyDown={(event) => {
          if (event.key === "Escape") {
            onCancel();
          }
        }}
      />
      <button type="submit" className="btn btn--primary btn--small">
        {t("apply")}
      </button>
      <button type="button" className="btn btn--ghost btn--small" onClick={onCancel}>
        {t("cancel")}
      </button>
      {error && (
        <span className="inline-error" role="alert">
          {error}
        </span>
      )}
    </form>
  );
}
