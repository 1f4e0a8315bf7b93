/**
 * Categories Command Implementation
 *
 * Prints the category radius table the matcher would use.
 */

import { formatDistance } from "@repo/geomatch-core/utils/distance";
import { loadMatcherConfig } from "../../service/config";
import { loadCategoryTable } from "../../service/helpers/categories";
import {
    displayKeyValue,
    displaySection,
    theme,
} from "../../service/helpers/terminalUI";
import type { CategoryDefinition } from "../../service/types";

/**
 * Describes one category on a single line.
 *
 * @param category - The category.
 * @returns e.g. `200m, code fac_cd, attributes ctp_cd/sig_cd`.
 */
export const describeCategory = (category: CategoryDefinition): string => {
    const parts = [
        formatDistance(category.radiusMeters),
        `code ${category.codeField}`,
    ];
    if (category.attributes.length > 0) {
        parts.push(`attributes ${category.attributes.join("/")}`);
    }
    if (category.timeType !== undefined) {
        parts.push(`time ${category.timeType}`);
    }
    return parts.join(", ");
};

/**
 * Executes the categories command.
 *
 * @param options - Command options from the CLI.
 */
export function runCategoriesCommand(options: { file?: string }): void {
    const file = options.file ?? loadMatcherConfig().categoriesFile;
    const table = loadCategoryTable(file);

    displaySection("Categories");
    console.log(theme.muted(`  ${file}\n`));
    displayKeyValue(
        Object.fromEntries(
            [...table.values()].map((category) => [
                category.name,
                describeCategory(category),
            ]),
        ),
    );
}
