import * as React from 'react'

import { cn } from '@/lib/utils'

const badgeVariants = {
    default: 'badge-default',
    high: 'badge-high',
    medium: 'badge-medium',
    low: 'badge-low',
    outline: 'badge-outline',
} as const

export type BadgeVariant = keyof typeof badgeVariants

export interface BadgeProps extends React.HTMLAttributes<HTMLSpanElement> {
    variant?: BadgeVariant
}

function Badge({ className, variant = 'default', ...props }: BadgeProps) {
    return <span className={cn('badge', badgeVariants[variant], className)} {...props} />
}

export { Badge, badgeVariants }
