import { ChevronDownIcon } from "@heroicons/react/24/outline";
import classNames from "classnames";
import { type ReactNode, useCallback, useId, useState } from "react";

type HeadingLevel = "h2" | "h3" | "h4";

type CollapsibleTileProps = {
  /** Stable slug for the tile; also names its content region. */
  id: string;
  title: ReactNode;
  subtitle?: ReactNode;
  /** Rendered on the right-hand side of the header. */
  actions?: ReactNode;
  children: ReactNode;
  className?: string;
  bodyClassName?: string;
  headingLevel?: HeadingLevel;
  /** Collapse state is kept for the page session only. */
  defaultCollapsed?: boolean;
};

export function CollapsibleTile({
  id,
  title,
  subtitle,
  actions,
  children,
  className,
  bodyClassName = "mt-4",
  headingLevel = "h2",
  defaultCollapsed = false,
}: CollapsibleTileProps) {
  const [collapsed, setCollapsed] = useState(defaultCollapsed);
  const buttonId = useId();
  const contentId = `${id.replace(/[^a-zA-Z0-9_-]/g, "-")}-content`;
  const HeadingTag = headingLevel;

  const toggle = useCallback(() => {
    setCollapsed((prev) => !prev);
  }, []);

  return (
    <section
      className={classNames(
        "rounded-2xl border border-emerald-800/40 bg-[rgba(7,31,21,0.78)] p-5 shadow-[0_25px_60px_rgba(5,22,15,0.45)] backdrop-blur-sm",
        className
      )}
      data-tile={id}
    >
      <div className="flex flex-wrap items-center justify-between gap-3">
        <button
          id={buttonId}
          type="button"
          onClick={toggle}
          className="group inline-flex min-w-0 flex-1 items-center gap-2 text-left"
          aria-expanded={!collapsed}
          aria-controls={contentId}
        >
          <ChevronDownIcon
            className={classNames(
              "h-5 w-5 flex-shrink-0 text-emerald-300/70 transition-transform duration-150 group-hover:text-emerald-200",
              collapsed ? "-rotate-90" : "rotate-0"
            )}
            aria-hidden="true"
          />
          <span className="flex min-w-0 flex-1 flex-col">
            <HeadingTag className="truncate text-base font-semibold text-emerald-50">{title}</HeadingTag>
            {subtitle ? <span className="text-xs text-emerald-200/70">{subtitle}</span> : null}
          </span>
        </button>
        {actions ? <div className="flex flex-shrink-0 items-center gap-2">{actions}</div> : null}
      </div>
      <div
        id={contentId}
        role="region"
        aria-labelledby={buttonId}
        hidden={collapsed}
        className={collapsed ? undefined : bodyClassName}
      >
        {collapsed ? null : children}
      </div>
    </section>
  );
}
