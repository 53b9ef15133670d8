import path from 'path'
import { config as loadDotenv } from 'dotenv'

loadDotenv({ path: path.join(process.cwd(), '.env') })
