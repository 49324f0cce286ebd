import type { LanguageCompletion } from "@lingodesk/shared";
import type { TranslateFn } from "../types/translations";

type CompletionBarProps = {
  t: TranslateFn;
  completion: LanguageCompletion;
  isSource?: boolean;
};

const toneFor = (percent: number) =>
  percent === 100 ? "complete" : percent >= 50 ? "partial" : "low";

export default function CompletionBar({ t, completion, isSource = false }: CompletionBarProps) {
  const { language, filled, total, percent } = completion;

  return (
    <div className="completion-bar">
      <div className="completion-bar__label">
        <strong>{language}</strong>
        {isSource && <span className="completion-bar__tag">{t("sourceTag")}</span>}
        <span>{t("completionLabel", { percent, filled, total })}</span>
      </div>
      <div
        className="completion-bar__track"
        role="progressbar"
        aria-label={t("completionAria", { language })}
        aria-valuemin={0}
        aria-valuemax={100}
        aria-valuenow={percent}
      >
        <div
          className={`completion-bar__fill completion-bar__fill--${toneFor(percent)}`}
          style={{ width: `${percent}%` }}
        />
      </div>
    </div>
  );
}
