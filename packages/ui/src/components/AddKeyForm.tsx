import type { FormEvent } from "react";
import type { TranslateFn } from "../types/translations";

type AddKeyFormProps = {
  t: TranslateFn;
  value: string;
  error: string | null;
  onChange: (value: string) => void;
  onSubmit: () => void | Promise<void>;
};

export default function AddKeyForm({ t, value, error, onChange, onSubmit }: AddKeyFormProps) {
  const handleSubmit = (event: FormEvent) => {
    event.preventDefault();
    void onSubmit();
  };

  return (
    <div className="add-key">
      <form className="add-key-form" onSubmit={handleSubmit}>
        <input
          aria-label={t("newKeyLabel")}
          aria-invalid={error ? true : undefined}
          value={value}
          onChange={(event) => onChange(event.target.value)}
          placeholder={t("newKeyPlaceholder")}
        />
        <button type="submit" className="btn btn--primary" disabled={!value.trim()}>
          {t("addKey")}
        </button>
      </form>
      {error && (
        <p className="add-key-form__error" role="alert">
          {error}
        </p>
      )}
    </div>
  );
}
