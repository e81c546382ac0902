import { loadConfig } from '@/lib/config'
import { convertWorkbookFile } from '@/lib/convert'

async function main(argv: string[]) {
  const [input, output] = argv
  if (!input) {
    console.error('Usage: timetable-sheets <workbook.xlsx|workbook.xls> [output.json]')
    return 1
  }
  try {
    await convertWorkbookFile(input, output, loadConfig())
    return 0
  } catch (error) {
    console.error(error instanceof Error ? error.message : error)
    return 1
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    console.error(error)
    process.exitCode = 1
  }
)
