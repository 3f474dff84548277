import * as React from "react";

export const SectionTitle: React.FC<{ children: React.ReactNode; description?: React.ReactNode }> = ({
  children,
  description,
}) => (
  <div className="mb-2">
    <h2 className="text-xl font-semibold tracking-tight">{children}</h2>
    {description ? <p className="text-sm text-muted-foreground">{description}</p> : null}
  </div>
);
