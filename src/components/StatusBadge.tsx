import { Badge } from "@/components/ui/badge";
import type { StatusView } from "@/lib/view-models";
import { cn } from "@/lib/utils";

export function StatusBadge({ view, className }: { view: StatusView; className?: string }) {
    return (
        <Badge variant="outline" className={cn(view.className, className)}>
            {view.label}
        </Badge>
    );
}
