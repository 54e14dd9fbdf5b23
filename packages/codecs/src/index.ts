export * from './tga/index'
