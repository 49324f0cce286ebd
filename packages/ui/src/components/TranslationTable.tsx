import type { TranslationRow } from "@lingodesk/shared";
import { isFilled } from "@lingodesk/shared";
import RenameInlineForm from "./RenameInlineForm";
import type { TranslateFn } from "../types/translations";

type TranslationTableModel = {
  languages: readonly string[];
  sourceLanguage: string;
  rows: TranslationRow[];
  renamingKey: string | null;
  renameValue: string;
  renameError: string | null;
};

type TranslationTableActions = {
  isCellDirty: (key: string, language: string) => boolean;
  onCellChange: (key: string, language: string, value: string) => void;
  onStartRename: (key: string) => void;
  onRenameValueChange: (value: string) => void;
  onApplyRename: () => void;
  onCancelRename: () => void;
  onDeleteKey: (key: string) => void;
};

type TranslationTableProps = {
  t: TranslateFn;
  model: TranslationTableModel;
  actions: TranslationTableActions;
};

const textareaRows = (value: string) => Math.min(6, Math.max(1, value.split("\n").length));

const cellClassName = (dirty: boolean, missing: boolean) => {
  const classes = ["value-cell"];
  if (missing) {
    classes.push("value-cell--missing");
  }
  if (dirty) {
    classes.push("value-cell--dirty");
  }
  return classes.join(" ");
};

export default function TranslationTable({ t, model, actions }: TranslationTableProps) {
  const { languages, sourceLanguage, rows, renamingKey, renameValue, renameError } = model;

  if (rows.length === 0) {
    return <p className="empty-state">{t("noRows")}</p>;
  }

  return (
    <div className="table-wrap">
      <table className="translation-table">
        <thead>
          <tr>
            <th className="key-col">{t("keyColumn")}</th>
            {languages.map((language) => (
              <th key={language} className="locale-col">
                {language}
                {language === sourceLanguage && (
                  <span className="locale-col__tag">{t("sourceTag")}</span>
                )}
              </th>
            ))}
            <th className="actions-col">{t("actionsColumn")}</th>
          </tr>
        </thead>
        <tbody>
          {rows.map((row) => (
            <tr key={row.key}>
              <td className="key-col">
                {renamingKey === row.key ? (
                  <RenameInlineForm
                    t={t}
                    keyName={row.key}
                    value={renameValue}
                    error={renameError}
                    onChange={actions.onRenameValueChange}
                    onApply={actions.onApplyRename}
                    onCancel={actions.onCancelRename}
                  />
                ) : (
                  <span className="key-col__label">{row.key}</span>
                )}
              </td>
              {languages.map((language) => {
                const value = row.values[language] ?? "";
                const dirty = actions.isCellDirty(row.key, language);

                return (
                  <td key={language} className={cellClassName(dirty, !isFilled(value))}>
                    <textarea
                      aria-label={`${language}:${row.key}`}
                      rows={textareaRows(value)}
                      className={dirty ? "value-input value-input--dirty" : "value-input"}
                      value={value}
                      onChange={(event) =>
                        actions.onCellChange(row.key, language, event.target.value)
                      }
                    />
                  </td>
                );
              })}
              <td className="actions-col">
                <div className="row-actions">
                  <button
                    type="button"
                    className="btn btn--ghost btn--small"
                    aria-label={t("renameKeyLabel", { key: row.key })}
                    onClick={() => actions.onStartRename(row.key)}
                  >
                    {t("rename")}
                  </button>
                  <button
                    type="button"
                    className="btn btn--danger btn--small"
                    aria-label={t("deleteKeyLabel", { key: row.key })}
                    onClick={() => actions.onDeleteKey(row.key)}
                  >
                    {t("delete")}
                  </button>
                </div>
              </td>
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
