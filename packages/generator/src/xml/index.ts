import type { GenerationContext } from '../core/context.ts'
import { NO_LOCATION } from '../core/intrinsic.ts'
import { parseRecordElement, type XmlRecord } from './document.ts'
import { scanRecords } from './scanner.ts'

export {
	childElements,
	childTexts,
	decodeEntities,
	parseRecordElement,
	textContent,
	type XmlElement,
	type XmlNode,
	type XmlRecord,
	type XmlText,
} from './document.ts'
export { RECORD_ELEMENT, type RecordSpan, scanRecords } from './scanner.ts'

/**
 * Read every <intrinsic> record of the database in document order.
 */
export function readDatabase(ctx: GenerationContext): XmlRecord[] {
	const records = scanRecords(ctx).map((span) => parseRecordElement(ctx, span))
	if (records.length === 0) {
		ctx.emit('SGXML050', NO_LOCATION)
	}
	return records
}
